/**
 * Core networking types for transport-agnostic packet replication
 */

import type { NetworkIdentity } from "../core/binary-codec/binary-codec";

/**
 * Generic transport adapter interface - implement this to support any transport layer
 * (WebSocket, WebRTC, a game engine's message channel, an in-process hub, etc.)
 *
 * The transport is expected to deliver every packet reliably and, per sender,
 * in send order. `send` reaches every other peer of the session.
 */
export interface TransportAdapter {
	/**
	 * Send binary data to every other peer
	 */
	send(data: Uint8Array): void | Promise<void>;

	/**
	 * Register a callback for incoming binary data
	 */
	onMessage(handler: (data: Uint8Array) => void): void;

	/**
	 * Register a callback for connection close/disconnect
	 */
	onClose(handler: () => void): void;

	/**
	 * Register a callback for transport errors (optional)
	 */
	onError?(handler: (error: Error) => void): void;

	/**
	 * Close the connection
	 */
	close(): void | Promise<void>;
}

/**
 * Session membership notifications, as reported by whatever hosts the session.
 */
export interface MembershipEvents {
	/** A participant joined the session */
	playerJoined: { identity: NetworkIdentity };
	/** A participant left the session */
	playerLeft: { identity: NetworkIdentity };
}

/**
 * Transport that also reports membership changes.
 */
export interface MembershipSource {
	onPlayerJoined(handler: (identity: NetworkIdentity) => void): void;
	onPlayerLeft(handler: (identity: NetworkIdentity) => void): void;
}

/**
 * Traffic counters kept by a {@link PacketBroadcaster}
 */
export interface NetworkStats {
	packetsSent: number;
	bytesSent: number;
	sendFailures: number;
}
