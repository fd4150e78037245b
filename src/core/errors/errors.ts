/**
 * Failure categories raised by the sync layer.
 *
 * - `protocol`: malformed or unexpected packet framing
 * - `capacity`: an asset exceeds the accepted size
 * - `decode`: packet fields could not be parsed
 * - `resource`: a local asset could not be read or decoded
 *
 * None of them is fatal to a session: receive paths log and drop.
 */
export type SyncErrorCategory = "protocol" | "capacity" | "decode" | "resource";

/**
 * Base class for every error the sync layer raises on purpose.
 */
export class SyncError extends Error {
  readonly category: SyncErrorCategory;

  constructor(category: SyncErrorCategory, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

/** Malformed or unexpected packet framing. */
export class ProtocolError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super("protocol", message, options);
  }
}

/**
 * Raised by {@link PacketReader} when a field cannot be read,
 * e.g. reading past the end of a packet.
 */
export class DecodeError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super("decode", message, options);
  }
}

/** An asset is larger than the configured ceiling. */
export class CapacityError extends SyncError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super("capacity", `Asset is too big: ${size} bytes > ${limit} bytes`);
    this.size = size;
    this.limit = limit;
  }
}

/** A local asset is unreadable or undecodable. */
export class ResourceError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super("resource", message, options);
  }
}

/**
 * Narrows an unknown thrown value to a message suitable for logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
