import { describe, expect, it } from "vitest";
import { PacketKind } from "../protocol/packets/packet-kind";
import { EntityKill } from "../protocol/packets/packets";
import { MockTransportAdapter, testLogger } from "../testing/fakes";
import { PacketBroadcaster } from "./broadcaster";

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup() {
	const transport = new MockTransportAdapter();
	const { logger, sink } = testLogger("Broadcaster");
	return { transport, sink, broadcaster: new PacketBroadcaster(transport, logger) };
}

describe("PacketBroadcaster", () => {
	it("should frame the body behind the kind byte", () => {
		const { broadcaster, transport } = setup();

		const packet = broadcaster.broadcast(PacketKind.EntitySnapshot, 2, (writer) => writer.u16(0x0102));

		expect([...packet]).toEqual([PacketKind.EntitySnapshot, 0x02, 0x01]);
		expect(transport.sentMessages).toEqual([packet]);
	});

	it("should encode fixed-layout packets", () => {
		const { broadcaster } = setup();
		expect(broadcaster.broadcastPacket(EntityKill, { netId: 9 })).toEqual(EntityKill.encode({ netId: 9 }));
	});

	it("should refuse a body larger than announced", () => {
		const { broadcaster, transport } = setup();

		expect(() => broadcaster.broadcast(PacketKind.EntityKill, 1, (writer) => writer.u32(1))).toThrow(RangeError);
		expect(transport.sentMessages).toHaveLength(0);
	});

	it("should count what was sent", async () => {
		const { broadcaster } = setup();
		broadcaster.broadcastPacket(EntityKill, { netId: 1 });
		broadcaster.broadcastPacket(EntityKill, { netId: 2 });
		await settle();

		expect(broadcaster.stats).toEqual({ packetsSent: 2, bytesSent: 10, sendFailures: 0 });
	});

	it("should log a failed broadcast instead of throwing", async () => {
		const { broadcaster, transport, sink } = setup();
		transport.failWith = new Error("link down");

		expect(() => broadcaster.broadcastPacket(EntityKill, { netId: 1 })).not.toThrow();
		await settle();

		expect(broadcaster.stats).toEqual({ packetsSent: 0, bytesSent: 0, sendFailures: 1 });
		expect(sink.messages("error")).toEqual(["[Broadcaster] Failed to broadcast EntityKill: Error: link down"]);
	});

	it("should reject a direct send that fails", async () => {
		const { broadcaster, transport } = setup();
		transport.failWith = new Error("link down");

		await expect(broadcaster.send(EntityKill.encode({ netId: 1 }))).rejects.toThrow("link down");
		expect(broadcaster.stats.sendFailures).toBe(1);
	});
});
