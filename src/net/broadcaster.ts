import { PacketWriter } from "../core/binary-codec/binary-codec";
import { describeError } from "../core/errors/errors";
import { Logger } from "../core/logger/logger";
import type { DefinedPacket } from "../protocol/packets/define-packet";
import { PACKET_KIND_SIZE, PacketKind } from "../protocol/packets/packet-kind";
import type { NetworkStats, TransportAdapter } from "./types";

/**
 * Outbound side of a session: frames packets and hands them to the transport.
 *
 * `broadcast` is fire-and-forget for the simulation path: a failing send is
 * logged and counted, never thrown back into a tick. `send` is for callers
 * that await delivery (the upload worker) and gets failures as rejections.
 *
 * @example
 * ```ts
 * const out = new PacketBroadcaster(transport);
 * out.broadcastPacket(EntityKill, { netId });
 * out.broadcast(PacketKind.EntitySnapshot, entity.snapshotSize, (w) => entity.write(w));
 * ```
 */
export class PacketBroadcaster {
	private readonly transport: TransportAdapter;
	private readonly logger: Logger;
	private readonly counters: NetworkStats = { packetsSent: 0, bytesSent: 0, sendFailures: 0 };

	constructor(transport: TransportAdapter, logger: Logger = new Logger("PacketBroadcaster")) {
		this.transport = transport;
		this.logger = logger;
	}

	get stats(): NetworkStats {
		return { ...this.counters };
	}

	/**
	 * Writes `[kind][body]` into a buffer of exactly `1 + bodySize` bytes
	 * and broadcasts it.
	 *
	 * @throws RangeError if `fill` writes more than `bodySize` bytes
	 */
	broadcast(kind: PacketKind, bodySize: number, fill: (writer: PacketWriter) => void): Uint8Array {
		const writer = new PacketWriter(PACKET_KIND_SIZE + bodySize);
		writer.u8(kind);
		fill(writer);

		const packet = writer.finish();
		this.fireAndForget(packet, PacketKind[kind]);
		return packet;
	}

	/**
	 * Encodes and broadcasts a fixed-layout packet.
	 */
	broadcastPacket<T extends object>(definition: DefinedPacket<T>, value: T): Uint8Array {
		return this.broadcast(definition.kind, definition.bodySize, (writer) => definition.write(writer, value));
	}

	/**
	 * Hands an already framed packet to the transport.
	 * Rejects if the transport fails.
	 */
	async send(packet: Uint8Array): Promise<void> {
		try {
			await this.transport.send(packet);
			this.count(packet);
		} catch (error) {
			this.counters.sendFailures++;
			throw error;
		}
	}

	private fireAndForget(packet: Uint8Array, label: string | undefined): void {
		void this.send(packet).catch((error: unknown) => {
			this.logger.error(`Failed to broadcast ${label ?? "packet"}: ${describeError(error)}`);
		});
	}

	private count(packet: Uint8Array): void {
		this.counters.packetsSent++;
		this.counters.bytesSent += packet.byteLength;
	}
}
