import { WebSocket, type RawData } from "ws";
import type { TransportAdapter } from "../types";

/**
 * The part of a `ws` socket the transport relies on.
 */
export interface WebSocketLike {
	readonly readyState: number;
	send(data: Uint8Array, cb?: (error?: Error) => void): void;
	close(): void;
	on(event: "message", listener: (data: RawData, isBinary: boolean) => void): this;
	on(event: "close", listener: (code: number, reason: Buffer) => void): this;
	on(event: "error", listener: (error: Error) => void): this;
}

/**
 * Flattens any `ws` payload shape into one byte array.
 */
export function toUint8Array(data: RawData): Uint8Array {
	if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
	if (Buffer.isBuffer(data)) return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
	return new Uint8Array(data);
}

/**
 * WebSocket transport adapter over the `ws` package.
 *
 * Expects the socket to reach a relay that forwards every binary message to
 * the other participants of the session, in order.
 */
export class WebSocketTransport implements TransportAdapter {
	private socket: WebSocketLike;
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<() => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];

	constructor(socket: WebSocketLike) {
		this.socket = socket;
		this.setupHandlers();
	}

	get isOpen(): boolean {
		return this.socket.readyState === WebSocket.OPEN;
	}

	/**
	 * Resolves once the socket accepted the packet.
	 * Rejects if the socket is not open or the write failed.
	 */
	send(data: Uint8Array): Promise<void> {
		if (!this.isOpen) {
			return Promise.reject(new Error(`WebSocket is not open (readyState ${this.socket.readyState})`));
		}

		return new Promise((resolve, reject) => {
			this.socket.send(data, (error) => (error ? reject(error) : resolve()));
		});
	}

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: () => void): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	close(): void {
		this.socket.close();
	}

	private setupHandlers(): void {
		this.socket.on("message", (data, isBinary) => {
			if (!isBinary) {
				this.emitError(new Error("Unexpected text message"));
				return;
			}

			const packet = toUint8Array(data);
			for (const handler of this.messageHandlers) {
				handler(packet);
			}
		});

		this.socket.on("close", () => {
			for (const handler of this.closeHandlers) {
				handler();
			}
		});

		this.socket.on("error", (error) => this.emitError(error));
	}

	private emitError(error: Error): void {
		for (const handler of this.errorHandlers) {
			handler(error);
		}
	}

	/**
	 * Static factory method to connect to a relay
	 */
	static connect(url: string): Promise<WebSocketTransport> {
		return new Promise((resolve, reject) => {
			const socket = new WebSocket(url);
			const transport = new WebSocketTransport(socket);

			socket.once("open", () => resolve(transport));
			socket.once("error", reject);
		});
	}
}
