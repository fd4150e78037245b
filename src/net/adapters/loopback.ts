import type { NetworkIdentity } from "../../core/binary-codec/binary-codec";
import { describeError } from "../../core/errors/errors";
import { formatIdentity } from "../../core/generate-id/generate-id";
import { Logger } from "../../core/logger/logger";
import type { MembershipSource, TransportAdapter } from "../types";

interface QueuedPacket {
	from: NetworkIdentity;
	data: Uint8Array;
}

/**
 * In-process session: every packet a peer sends reaches every other peer,
 * in one global send order.
 *
 * Delivery is synchronous but never nested. A packet sent from inside a
 * message handler is queued and delivered after the current one, so
 * handlers always see packets in send order.
 *
 * @example
 * ```ts
 * const hub = new LoopbackHub();
 * const a = hub.join(1n);
 * const b = hub.join(2n);
 * b.onMessage((packet) => console.log(packet));
 * a.send(new Uint8Array([7, 1, 0, 0, 0]));
 * ```
 */
export class LoopbackHub {
	private readonly peers = new Map<NetworkIdentity, LoopbackPeer>();
	private readonly queue: QueuedPacket[] = [];
	private draining = false;
	private readonly logger: Logger;

	constructor(logger: Logger = new Logger("LoopbackHub")) {
		this.logger = logger;
	}

	/** Identities currently in the session, in join order */
	get members(): NetworkIdentity[] {
		return [...this.peers.keys()];
	}

	/**
	 * Adds a participant. Everyone already present is told about it.
	 * @throws Error if the identity is already in the session
	 */
	join(identity: NetworkIdentity): LoopbackPeer {
		if (this.peers.has(identity)) {
			throw new Error(`${formatIdentity(identity)} already joined`);
		}

		const peer = new LoopbackPeer(this, identity);
		const others = [...this.peers.values()];
		this.peers.set(identity, peer);

		for (const other of others) {
			other._handleJoined(identity);
		}

		return peer;
	}

	/**
	 * Removes a participant. Its close handlers run, then everyone left is told.
	 */
	leave(identity: NetworkIdentity): void {
		const peer = this.peers.get(identity);
		if (!peer) return;

		this.peers.delete(identity);
		peer._handleClose();

		for (const other of this.peers.values()) {
			other._handleLeft(identity);
		}
	}

	/**
	 * Internal: queues a packet from `from` for every other peer (called by LoopbackPeer)
	 */
	_publish(from: NetworkIdentity, data: Uint8Array): void {
		if (!this.peers.has(from)) {
			throw new Error(`${formatIdentity(from)} is not in the session`);
		}

		this.queue.push({ from, data: data.slice() });
		if (this.draining) return;

		this.draining = true;
		try {
			let next = this.queue.shift();
			while (next) {
				this.deliver(next);
				next = this.queue.shift();
			}
		} finally {
			this.draining = false;
		}
	}

	private deliver({ from, data }: QueuedPacket): void {
		for (const [identity, peer] of this.peers) {
			if (identity === from) continue;

			try {
				peer._handleMessage(data.slice());
			} catch (error) {
				this.logger.error(
					`Handler of ${formatIdentity(identity)} failed on a packet from ${formatIdentity(from)}: ${describeError(error)}`
				);
			}
		}
	}
}

/**
 * One participant's view of a {@link LoopbackHub}.
 */
export class LoopbackPeer implements TransportAdapter, MembershipSource {
	readonly identity: NetworkIdentity;
	private readonly hub: LoopbackHub;
	private closed = false;
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<() => void> = [];
	private joinedHandlers: Array<(identity: NetworkIdentity) => void> = [];
	private leftHandlers: Array<(identity: NetworkIdentity) => void> = [];

	constructor(hub: LoopbackHub, identity: NetworkIdentity) {
		this.hub = hub;
		this.identity = identity;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	send(data: Uint8Array): void {
		if (this.closed) {
			throw new Error(`${formatIdentity(this.identity)} has left the session`);
		}
		this.hub._publish(this.identity, data);
	}

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: () => void): void {
		this.closeHandlers.push(handler);
	}

	onPlayerJoined(handler: (identity: NetworkIdentity) => void): void {
		this.joinedHandlers.push(handler);
	}

	onPlayerLeft(handler: (identity: NetworkIdentity) => void): void {
		this.leftHandlers.push(handler);
	}

	close(): void {
		this.hub.leave(this.identity);
	}

	/**
	 * Internal: Call message handlers (used by the hub)
	 */
	_handleMessage(data: Uint8Array): void {
		for (const handler of this.messageHandlers) {
			handler(data);
		}
	}

	/**
	 * Internal: Call close handlers (used by the hub)
	 */
	_handleClose(): void {
		if (this.closed) return;
		this.closed = true;
		for (const handler of this.closeHandlers) {
			handler();
		}
	}

	_handleJoined(identity: NetworkIdentity): void {
		for (const handler of this.joinedHandlers) {
			handler(identity);
		}
	}

	_handleLeft(identity: NetworkIdentity): void {
		for (const handler of this.leftHandlers) {
			handler(identity);
		}
	}
}
