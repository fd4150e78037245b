import { describe, expect, it, vi } from "vitest";
import { DecodeError } from "../core/errors/errors";
import { PacketKind } from "../protocol/packets/packet-kind";
import { EntityKill } from "../protocol/packets/packets";
import { testLogger } from "../testing/fakes";
import { PacketRouter } from "./packet-router";

function setup(maxMessageSize?: number) {
	const { logger, sink } = testLogger("Router");
	return { sink, router: new PacketRouter({ maxMessageSize, logger }) };
}

describe("PacketRouter", () => {
	it("should route a packet to the handler of its kind", () => {
		const { router } = setup();
		const onKill = vi.fn();
		const onSpawn = vi.fn();
		router.on(PacketKind.EntityKill, onKill);
		router.on(PacketKind.SpraySpawn, onSpawn);

		const packet = EntityKill.encode({ netId: 3 });

		expect(router.dispatch(packet)).toBe(true);
		expect(onKill).toHaveBeenCalledWith(packet);
		expect(onSpawn).not.toHaveBeenCalled();
	});

	it("should drop empty packets and unknown kinds", () => {
		const { router, sink } = setup();

		expect(router.dispatch(new Uint8Array(0))).toBe(false);
		expect(router.dispatch(new Uint8Array([0x42, 1, 2]))).toBe(false);
		expect(sink.messages("warn")).toEqual(["[Router] Dropping empty packet", "[Router] Dropping packet of unknown kind 66"]);
	});

	it("should drop oversized packets unread", () => {
		const { router, sink } = setup(4);
		const handler = vi.fn();
		router.on(PacketKind.EntityKill, handler);

		expect(router.dispatch(EntityKill.encode({ netId: 1 }))).toBe(false);
		expect(handler).not.toHaveBeenCalled();
		expect(sink.messages("warn")).toEqual(["[Router] Dropping packet of 5 bytes (max 4)"]);
	});

	it("should report a kind nobody handles", () => {
		const { router, sink } = setup();

		expect(router.dispatch(EntityKill.encode({ netId: 1 }))).toBe(false);
		expect(sink.messages("log")).toEqual(["[Router] No handler for EntityKill packets"]);
	});

	it("should contain a failing handler", () => {
		const { router, sink } = setup();
		router.on(PacketKind.EntityKill, () => {
			throw new DecodeError("boom");
		});

		expect(router.dispatch(EntityKill.encode({ netId: 1 }))).toBe(false);
		expect(sink.messages("warn")).toEqual(["[Router] Dropping EntityKill packet: DecodeError: boom"]);
	});

	it("should replace a handler and keep the newer one on a stale unsubscribe", () => {
		const { router, sink } = setup();
		const first = vi.fn();
		const second = vi.fn();
		const offFirst = router.on(PacketKind.EntityKill, first);
		const offSecond = router.on(PacketKind.EntityKill, second);

		offFirst();
		router.dispatch(EntityKill.encode({ netId: 1 }));
		expect(first).not.toHaveBeenCalled();
		expect(second).toHaveBeenCalledTimes(1);
		expect(sink.messages("warn")).toEqual(["[Router] Replacing the handler of EntityKill packets"]);

		offSecond();
		expect(router.dispatch(EntityKill.encode({ netId: 1 }))).toBe(false);
	});
});
