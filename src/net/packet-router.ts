import { describeError } from "../core/errors/errors";
import { Logger } from "../core/logger/logger";
import { PacketKind, readPacketKind } from "../protocol/packets/packet-kind";

export type PacketHandler = (packet: Uint8Array) => void;

export interface PacketRouterConfig {
	/** Packets longer than this are dropped unread (default: 64KB) */
	maxMessageSize?: number;
	logger?: Logger;
}

/**
 * Inbound side of a session: routes raw packets to one handler per kind.
 *
 * `dispatch` never throws. A packet that is oversized, of an unknown kind or
 * rejected by its handler is logged and dropped, and the session carries on.
 */
export class PacketRouter {
	private readonly handlers = new Map<PacketKind, PacketHandler>();
	private readonly maxMessageSize: number;
	private readonly logger: Logger;

	constructor(config: PacketRouterConfig = {}) {
		this.maxMessageSize = config.maxMessageSize ?? 65536;
		this.logger = config.logger ?? new Logger("PacketRouter");
	}

	/**
	 * Registers the handler of a packet kind, replacing any previous one.
	 * @returns Unsubscribe function
	 */
	on(kind: PacketKind, handler: PacketHandler): () => void {
		if (this.handlers.has(kind)) {
			this.logger.warn(`Replacing the handler of ${PacketKind[kind]} packets`);
		}

		this.handlers.set(kind, handler);
		return () => {
			if (this.handlers.get(kind) === handler) this.handlers.delete(kind);
		};
	}

	/**
	 * Routes one packet.
	 * @returns true if a handler ran to completion
	 */
	dispatch(packet: Uint8Array): boolean {
		if (packet.byteLength > this.maxMessageSize) {
			this.logger.warn(`Dropping packet of ${packet.byteLength} bytes (max ${this.maxMessageSize})`);
			return false;
		}

		const kind = readPacketKind(packet);
		if (kind === undefined) {
			this.logger.warn(
				packet.byteLength === 0 ? "Dropping empty packet" : `Dropping packet of unknown kind ${packet[0]}`
			);
			return false;
		}

		const handler = this.handlers.get(kind);
		if (!handler) {
			this.logger.debug(`No handler for ${PacketKind[kind]} packets`);
			return false;
		}

		try {
			handler(packet);
			return true;
		} catch (error) {
			this.logger.warn(`Dropping ${PacketKind[kind]} packet: ${describeError(error)}`);
			return false;
		}
	}
}
