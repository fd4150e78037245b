import {
	PacketReader,
	PacketWriter,
	getSchemaSize,
	type Field,
	type InferSchema,
	type Schema,
} from "../../core/binary-codec/binary-codec";
import { ProtocolError } from "../../core/errors/errors";
import { PACKET_KIND_SIZE, PacketKind } from "./packet-kind";

/**
 * Configuration for defining a fixed-layout packet.
 * @template S The schema type describing the packet's body fields
 */
export interface PacketDefinition<S extends Record<string, Field<unknown>>> {
	/** Kind byte identifying this packet (must be unique) */
	kind: PacketKind;
	/** Body fields, in wire order */
	schema: S;
}

/**
 * Compile-time packet definition with type safety.
 * Created by definePacket() helper.
 */
export interface DefinedPacket<T extends object> {
	kind: PacketKind;
	/** Body size in bytes (the size hint handed to the transport) */
	bodySize: number;
	/** Total size on the wire, kind byte included */
	size: number;
	/** Writes the body fields (not the kind byte) */
	write(writer: PacketWriter, value: T): void;
	/** Encodes kind byte and body */
	encode(value: T): Uint8Array;
	/**
	 * Decodes a whole packet.
	 * @throws ProtocolError if the size or kind byte do not match
	 */
	decode(packet: Uint8Array): T;
	/** Phantom type for inference */
	type: T;
}

/**
 * Define a fixed-size packet from a schema.
 *
 * The body size is computed from the schema, and `decode` rejects any buffer
 * that is not exactly `1 + bodySize` bytes long, so a truncated or padded
 * packet never reaches state.
 *
 * @example
 * ```ts
 * const TransferBegin = definePacket({
 *   kind: PacketKind.TransferBegin,
 *   schema: {
 *     sender: BinaryPrimitives.identity,
 *     totalLength: BinaryPrimitives.u32,
 *   },
 * });
 *
 * TransferBegin.size; // 13
 * const bytes = TransferBegin.encode({ sender: 7n, totalLength: 1024 });
 * const { sender, totalLength } = TransferBegin.decode(bytes);
 * ```
 */
export function definePacket<S extends Record<string, Field<unknown>>>(
	definition: PacketDefinition<S>
): DefinedPacket<InferSchema<S>> {
	type Body = InferSchema<S>;

	const schema = definition.schema as Schema<Body>;
	const bodySize = getSchemaSize(schema);
	const size = PACKET_KIND_SIZE + bodySize;
	const keys = Object.keys(schema) as (keyof Body)[];

	const write = (writer: PacketWriter, value: Body): void => {
		for (const key of keys) {
			writer.field(schema[key], value[key]);
		}
	};

	return {
		kind: definition.kind,
		bodySize,
		size,
		write,
		encode(value) {
			const writer = new PacketWriter(size);
			writer.u8(definition.kind);
			write(writer, value);
			return writer.finish();
		},
		decode(packet) {
			if (packet.byteLength !== size) {
				throw new ProtocolError(
					`Malformed ${PacketKind[definition.kind]} packet: ${packet.byteLength} bytes, expected ${size}`
				);
			}

			const reader = new PacketReader(packet);
			const kind = reader.u8();
			if (kind !== definition.kind) {
				throw new ProtocolError(
					`Expected ${PacketKind[definition.kind]} packet, got kind ${kind}`
				);
			}

			return reader.schema(schema);
		},
		type: undefined as unknown as Body,
	};
}
