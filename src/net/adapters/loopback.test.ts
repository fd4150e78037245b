import { describe, expect, it, vi } from "vitest";
import { testLogger } from "../../testing/fakes";
import { LoopbackHub } from "./loopback";

const ALICE = 0xa1n;
const BOB = 0xb0n;
const CAROL = 0xc0n;

function hubWith() {
	const { logger, sink } = testLogger("Hub");
	return { hub: new LoopbackHub(logger), sink };
}

describe("LoopbackHub", () => {
	it("should deliver a packet to everyone but its sender", () => {
		const { hub } = hubWith();
		const alice = hub.join(ALICE);
		const bob = hub.join(BOB);
		const toAlice = vi.fn();
		const toBob = vi.fn();
		alice.onMessage(toAlice);
		bob.onMessage(toBob);

		alice.send(new Uint8Array([7, 1]));

		expect(toAlice).not.toHaveBeenCalled();
		expect(toBob).toHaveBeenCalledWith(new Uint8Array([7, 1]));
	});

	it("should hand every receiver its own copy", () => {
		const { hub } = hubWith();
		const alice = hub.join(ALICE);
		const bob = hub.join(BOB);
		const received: Uint8Array[] = [];
		bob.onMessage((packet) => received.push(packet));

		const packet = new Uint8Array([7, 1]);
		alice.send(packet);
		packet[1] = 9;

		expect([...received[0]]).toEqual([7, 1]);
	});

	it("should deliver packets sent from a handler after the current one", () => {
		const { hub } = hubWith();
		const alice = hub.join(ALICE);
		const bob = hub.join(BOB);
		const carol = hub.join(CAROL);
		const seenByCarol: number[] = [];

		bob.onMessage((packet) => {
			if (packet[0] === 1) bob.send(new Uint8Array([2]));
		});
		carol.onMessage((packet) => seenByCarol.push(packet[0]));

		alice.send(new Uint8Array([1]));

		expect(seenByCarol).toEqual([1, 2]);
	});

	it("should keep delivering when a handler throws", () => {
		const { hub, sink } = hubWith();
		const alice = hub.join(ALICE);
		const bob = hub.join(BOB);
		const carol = hub.join(CAROL);
		const toCarol = vi.fn();
		bob.onMessage(() => {
			throw new Error("bad handler");
		});
		carol.onMessage(toCarol);

		alice.send(new Uint8Array([1]));

		expect(toCarol).toHaveBeenCalledTimes(1);
		expect(sink.messages("error")).toEqual([
			"[Hub] Handler of 00000000000000b0 failed on a packet from 00000000000000a1: Error: bad handler",
		]);
	});

	it("should tell present members about a newcomer", () => {
		const { hub } = hubWith();
		const alice = hub.join(ALICE);
		const joined = vi.fn();
		alice.onPlayerJoined(joined);

		const bob = hub.join(BOB);
		const bobSaw = vi.fn();
		bob.onPlayerJoined(bobSaw);

		expect(joined).toHaveBeenCalledWith(BOB);
		expect(bobSaw).not.toHaveBeenCalled();
		expect(hub.members).toEqual([ALICE, BOB]);
		expect(() => hub.join(BOB)).toThrow("00000000000000b0 already joined");
	});

	it("should close a leaving peer and tell the others", () => {
		const { hub } = hubWith();
		const alice = hub.join(ALICE);
		const bob = hub.join(BOB);
		const left = vi.fn();
		const closed = vi.fn();
		alice.onPlayerLeft(left);
		bob.onClose(closed);

		bob.close();

		expect(bob.isClosed).toBe(true);
		expect(closed).toHaveBeenCalledTimes(1);
		expect(left).toHaveBeenCalledWith(BOB);
		expect(hub.members).toEqual([ALICE]);
		expect(() => bob.send(new Uint8Array([1]))).toThrow("00000000000000b0 has left the session");
	});
});
