import { EventEmitter } from "node:events";
import { WebSocket } from "ws";
import { describe, expect, it, vi } from "vitest";
import { WebSocketTransport, toUint8Array, type WebSocketLike } from "./ws-websocket";

/**
 * Socket stand-in: records writes and lets tests emit socket events.
 */
class FakeSocket extends EventEmitter implements WebSocketLike {
	readyState: number = WebSocket.OPEN;
	written: Uint8Array[] = [];
	writeError: Error | undefined;

	send(data: Uint8Array, cb?: (error?: Error) => void): void {
		this.written.push(data);
		cb?.(this.writeError);
	}

	close(): void {
		this.readyState = WebSocket.CLOSED;
		this.emit("close", 1000, Buffer.alloc(0));
	}
}

describe("toUint8Array", () => {
	it("should accept every payload shape", () => {
		expect(toUint8Array(Buffer.from([1, 2]))).toEqual(new Uint8Array([1, 2]));
		const arrayBuffer = new ArrayBuffer(2);
		new Uint8Array(arrayBuffer).set([3, 4]);

		expect(toUint8Array(arrayBuffer)).toEqual(new Uint8Array([3, 4]));
		expect(toUint8Array([Buffer.from([5]), Buffer.from([6, 7])])).toEqual(new Uint8Array([5, 6, 7]));
	});
});

describe("WebSocketTransport", () => {
	it("should send binary packets while open", async () => {
		const socket = new FakeSocket();
		const transport = new WebSocketTransport(socket);

		await transport.send(new Uint8Array([7, 1]));

		expect(transport.isOpen).toBe(true);
		expect(socket.written).toEqual([new Uint8Array([7, 1])]);
	});

	it("should reject a send on a closed socket", async () => {
		const socket = new FakeSocket();
		const transport = new WebSocketTransport(socket);
		transport.close();

		await expect(transport.send(new Uint8Array([1]))).rejects.toThrow("WebSocket is not open (readyState 3)");
		expect(socket.written).toHaveLength(0);
	});

	it("should reject when the write fails", async () => {
		const socket = new FakeSocket();
		socket.writeError = new Error("socket hang up");
		const transport = new WebSocketTransport(socket);

		await expect(transport.send(new Uint8Array([1]))).rejects.toThrow("socket hang up");
	});

	it("should pass binary messages on", () => {
		const socket = new FakeSocket();
		const transport = new WebSocketTransport(socket);
		const received = vi.fn();
		transport.onMessage(received);

		socket.emit("message", Buffer.from([5, 1, 2]), true);

		expect(received).toHaveBeenCalledWith(new Uint8Array([5, 1, 2]));
	});

	it("should report text messages as errors", () => {
		const socket = new FakeSocket();
		const transport = new WebSocketTransport(socket);
		const received = vi.fn();
		const errors: Error[] = [];
		transport.onMessage(received);
		transport.onError((error) => errors.push(error));

		socket.emit("message", Buffer.from("hello"), false);

		expect(received).not.toHaveBeenCalled();
		expect(errors.map((error) => error.message)).toEqual(["Unexpected text message"]);
	});

	it("should run close handlers when the socket closes", () => {
		const socket = new FakeSocket();
		const transport = new WebSocketTransport(socket);
		const closed = vi.fn();
		transport.onClose(closed);

		socket.close();

		expect(closed).toHaveBeenCalledTimes(1);
		expect(transport.isOpen).toBe(false);
	});
});
