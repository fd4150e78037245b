import { DecodeError } from "../errors/errors";

/**
 * Opaque 64-bit identifier of a session participant.
 */
export type NetworkIdentity = bigint;

/** 3D vector of f32 (x, y, z) */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;

  /**
   * Returns the nil value
   */
  toNil(): T;
};

/**
 * A schema mapping object keys to binary fields.
 * The order of iteration defines the binary layout.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type Schema<T> = {
  [K in keyof T]: Field<T[K]>;
};

/**
 * Infers the value type described by a schema.
 */
export type InferSchema<S> = {
  [K in keyof S]: S[K] extends Field<infer V> ? V : never;
};

const schemaSizes = new WeakMap<object, number>();

/**
 * Computes and caches the total byte size of a schema.
 * @param schema Binary schema definition
 */
export function getSchemaSize<T extends object>(schema: Schema<T>): number {
  const cached = schemaSizes.get(schema);
  if (cached !== undefined) return cached;

  let size = 0;
  for (const k of Object.keys(schema) as (keyof T)[]) {
    size += schema[k].size;
  }

  schemaSizes.set(schema, size);
  return size;
}

/**
 * Built-in binary primitive field definitions.
 * Every multi-byte value is little-endian; the protocol never infers byte order.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v),
    read: (dv, o) => dv.getUint8(o),
    toNil: () => 0,
  };

  /** Unsigned 16-bit integer */
  static readonly u16: Field<number> = {
    size: 2,
    write: (dv, o, v) => dv.setUint16(o, v, true),
    read: (dv, o) => dv.getUint16(o, true),
    toNil: () => 0,
  };

  /** Unsigned 32-bit integer */
  static readonly u32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setUint32(o, v, true),
    read: (dv, o) => dv.getUint32(o, true),
    toNil: () => 0,
  };

  /** Signed 32-bit integer */
  static readonly i32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setInt32(o, v, true),
    read: (dv, o) => dv.getInt32(o, true),
    toNil: () => 0,
  };

  /** 32-bit floating point number (IEEE 754) */
  static readonly f32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setFloat32(o, v, true),
    read: (dv, o) => dv.getFloat32(o, true),
    toNil: () => 0,
  };

  /** Boolean stored as 1 byte (0 = false, 1 = true) */
  static readonly bool: Field<boolean> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v ? 1 : 0),
    read: (dv, o) => dv.getUint8(o) !== 0,
    toNil: () => false,
  };

  /** Network identity as an unsigned 64-bit integer */
  static readonly identity: Field<NetworkIdentity> = {
    size: 8,
    write: (dv, o, v) => dv.setBigUint64(o, v, true),
    read: (dv, o) => dv.getBigUint64(o, true),
    toNil: () => 0n,
  };

  /** 3D vector of f32 (x, y, z) */
  static readonly vec3: Field<Vec3> = {
    size: 12,
    write(dv, o, v) {
      dv.setFloat32(o, v.x, true);
      dv.setFloat32(o + 4, v.y, true);
      dv.setFloat32(o + 8, v.z, true);
    },
    read(dv, o) {
      return {
        x: dv.getFloat32(o, true),
        y: dv.getFloat32(o + 4, true),
        z: dv.getFloat32(o + 8, true),
      };
    },
    toNil: () => ({ x: 0, y: 0, z: 0 }),
  };
}

/**
 * @description
 * Sequential packet writer over a buffer of a size declared up front.
 *
 * Callers declare the exact (or, for variable packets, maximum) serialized
 * size so the transport can preallocate. Writing past it is a programming
 * error and throws a `RangeError`.
 *
 * @example
 * ```ts
 * const w = new PacketWriter(13);
 * w.u8(PacketKind.TransferBegin);
 * w.identity(localId);
 * w.u32(payload.length);
 * transport.send(w.finish());
 * ```
 */
export class PacketWriter {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(size: number) {
    this.buffer = new Uint8Array(size);
    this.view = new DataView(this.buffer.buffer);
  }

  /** Declared capacity in bytes */
  get capacity(): number {
    return this.buffer.byteLength;
  }

  /** Bytes written so far */
  get position(): number {
    return this.offset;
  }

  field<T>(field: Field<T>, value: T): this {
    this.reserve(field.size);
    field.write(this.view, this.offset, value);
    this.offset += field.size;
    return this;
  }

  u8(value: number): this {
    return this.field(BinaryPrimitives.u8, value);
  }

  u16(value: number): this {
    return this.field(BinaryPrimitives.u16, value);
  }

  u32(value: number): this {
    return this.field(BinaryPrimitives.u32, value);
  }

  i32(value: number): this {
    return this.field(BinaryPrimitives.i32, value);
  }

  f32(value: number): this {
    return this.field(BinaryPrimitives.f32, value);
  }

  bool(value: boolean): this {
    return this.field(BinaryPrimitives.bool, value);
  }

  identity(value: NetworkIdentity): this {
    return this.field(BinaryPrimitives.identity, value);
  }

  vec3(value: Vec3): this {
    return this.field(BinaryPrimitives.vec3, value);
  }

  /**
   * Copies `length` bytes of `source` starting at `start`.
   */
  bytes(source: Uint8Array, start = 0, length = source.byteLength - start): this {
    if (start < 0 || length < 0 || start + length > source.byteLength) {
      throw new RangeError(
        `Byte range ${start}+${length} is outside a source of ${source.byteLength} bytes`
      );
    }
    this.reserve(length);
    this.buffer.set(source.subarray(start, start + length), this.offset);
    this.offset += length;
    return this;
  }

  /**
   * Returns the written bytes. The view is exact-sized when the packet
   * was shorter than its declared capacity.
   */
  finish(): Uint8Array {
    return this.offset === this.buffer.byteLength
      ? this.buffer
      : this.buffer.subarray(0, this.offset);
  }

  private reserve(size: number): void {
    if (this.offset + size > this.buffer.byteLength) {
      throw new RangeError(
        `Packet overflow: writing ${size} bytes at ${this.offset}, declared size is ${this.buffer.byteLength}`
      );
    }
  }
}

/**
 * @description
 * Sequential packet reader. Fields must be read in exactly the order they
 * were written; there are no self-describing tags.
 *
 * Reading past the end throws a {@link DecodeError} instead of yielding zeros.
 */
export class PacketReader {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  /** Total packet length in bytes */
  get length(): number {
    return this.buffer.byteLength;
  }

  /** Cursor position */
  get position(): number {
    return this.offset;
  }

  /** Bytes left after the cursor */
  get remaining(): number {
    return this.buffer.byteLength - this.offset;
  }

  field<T>(field: Field<T>): T {
    this.require(field.size);
    const value = field.read(this.view, this.offset);
    this.offset += field.size;
    return value;
  }

  u8(): number {
    return this.field(BinaryPrimitives.u8);
  }

  u16(): number {
    return this.field(BinaryPrimitives.u16);
  }

  u32(): number {
    return this.field(BinaryPrimitives.u32);
  }

  i32(): number {
    return this.field(BinaryPrimitives.i32);
  }

  f32(): number {
    return this.field(BinaryPrimitives.f32);
  }

  bool(): boolean {
    return this.field(BinaryPrimitives.bool);
  }

  identity(): NetworkIdentity {
    return this.field(BinaryPrimitives.identity);
  }

  vec3(): Vec3 {
    return this.field(BinaryPrimitives.vec3);
  }

  /**
   * Returns a copy of the next `length` bytes.
   */
  bytes(length: number): Uint8Array {
    this.require(length);
    const out = this.buffer.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  /**
   * Reads a whole schema in declaration order.
   */
  schema<T extends object>(schema: Schema<T>): T {
    const target = {} as T;
    for (const k of Object.keys(schema) as (keyof T)[]) {
      target[k] = this.field(schema[k]);
    }
    return target;
  }

  private require(size: number): void {
    if (size < 0 || this.offset + size > this.buffer.byteLength) {
      throw new DecodeError(
        `Read past end of packet: need ${size} bytes at offset ${this.offset}, length is ${this.buffer.byteLength}`
      );
    }
  }
}

/**
 * Schema-driven codec for fixed-size records.
 */
export class BinaryCodec {
  /**
   * Encodes an object into a right-sized buffer using the given schema.
   */
  static encode<T extends object>(schema: Schema<T>, data: T): Uint8Array {
    const writer = new PacketWriter(getSchemaSize(schema));
    for (const k of Object.keys(schema) as (keyof T)[]) {
      writer.field(schema[k], data[k]);
    }
    return writer.finish();
  }

  /**
   * Decodes a buffer into a new object using the given schema.
   * Throws a {@link DecodeError} if the buffer is too small.
   */
  static decode<T extends object>(schema: Schema<T>, buf: Uint8Array): T {
    return new PacketReader(buf).schema(schema);
  }
}
