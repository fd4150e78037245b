import { describe, expect, it } from "vitest";
import type { NetworkIdentity } from "../core/binary-codec/binary-codec";
import { LoopbackHub, type LoopbackPeer } from "../net/adapters/loopback";
import { PacketKind } from "../protocol/packets/packet-kind";
import { TransferBegin, TransferResync, encodeTransferChunk } from "../protocol/packets/packets";
import { SprayFile } from "../sprays/spray-library";
import {
	FakeBodyFactory,
	FakeDecalFactory,
	MemorySink,
	MockTransportAdapter,
	TextDecoderStub,
	ascii,
	testLogger,
	type FakeImage,
} from "../testing/fakes";
import type { TransportAdapter } from "../net/types";
import type { SyncEvents } from "./events";
import { SyncSession } from "./sync-session";

const ALICE = 0xa1n;
const BOB = 0xb0n;
const CAROL = 0xc0n;
const WALL = { x: 4, y: 1, z: 0 };
const FACING = { x: -1, y: 0, z: 0 };

/** Shared manual clock */
class Clock {
	time = 0;
	readonly now = () => this.time;
}

function createPeer(identity: NetworkIdentity, transport: TransportAdapter, clock: Clock, membership?: LoopbackPeer) {
	const decals = new FakeDecalFactory();
	const bodies = new FakeBodyFactory();
	const sink = new MemorySink();
	const source: { current: SprayFile | null } = { current: new SprayFile("tag.png", ascii(`tag-${identity}`)) };

	const session = new SyncSession<FakeImage>({
		localIdentity: identity,
		transport,
		membership,
		decoder: new TextDecoderStub(),
		decals,
		bodies,
		source,
		now: clock.now,
		debug: true,
		logSink: sink,
	});

	return { session, decals, bodies, sink, source };
}

function onHub(hub: LoopbackHub, identity: NetworkIdentity, clock: Clock) {
	const transport = hub.join(identity);
	return { ...createPeer(identity, transport, clock, transport), transport };
}

/** Resolves with the next payload of `name` */
function next<Name extends keyof SyncEvents>(session: SyncSession<FakeImage>, name: Name): Promise<SyncEvents[Name]> {
	return new Promise((resolve) => {
		session.events.once(name, resolve);
	});
}

function pair() {
	const hub = new LoopbackHub(testLogger("Hub").logger);
	const clock = new Clock();
	const alice = onHub(hub, ALICE, clock);
	const bob = onHub(hub, BOB, clock);
	return { hub, clock, alice, bob };
}

describe("SyncSession", () => {
	describe("sprays", () => {
		it("should deliver a spray and its image to the other peer", async () => {
			const { alice, bob } = pair();
			const assigned = next(bob.session, "assetAssigned");

			const result = alice.session.spray(WALL, FACING);

			expect(result.status).toBe("spawned");
			expect(bob.decals.spawned).toHaveLength(1);
			expect(bob.decals.spawned[0].owner).toBe(ALICE);

			expect(await assigned).toEqual({ owner: ALICE, size: 7 });
			expect(bob.decals.spawned[0].images).toEqual([{ text: "tag-161" }]);
			expect(bob.session.pendingTransfers).toBe(0);
		});

		it("should upload again after a newcomer reset every cache", async () => {
			const { hub, clock, alice, bob } = pair();
			const firstUpload = next(bob.session, "assetAssigned");
			alice.session.spray(WALL, FACING);
			await firstUpload;

			const carol = onHub(hub, CAROL, clock);
			expect(alice.session.directory.size).toBe(0);
			expect(bob.session.directory.size).toBe(0);

			const carolAssigned = next(carol.session, "assetAssigned");
			const result = alice.session.spray(WALL, FACING);

			expect(result.status === "spawned" && result.uploading).toBe(true);
			expect(await carolAssigned).toEqual({ owner: ALICE, size: 7 });
		});

		it("should ask for a resync when the begin packet was missed", () => {
			const clock = new Clock();
			const transport = new MockTransportAdapter();
			const bob = createPeer(BOB, transport, clock);
			const lost: NetworkIdentity[] = [];
			bob.session.events.on("transferLost", ({ sender }) => lost.push(sender));

			transport.simulateMessage(encodeTransferChunk(ALICE, ascii("tag"), 0));

			expect(lost).toEqual([ALICE]);
			expect(transport.sentMessages.map((packet) => packet[0])).toEqual([PacketKind.TransferResync]);
			expect(TransferResync.decode(transport.sentMessages[0])).toEqual({ requester: BOB, target: ALICE });
		});

		it("should drop a stalled transfer after the deadline", () => {
			const clock = new Clock();
			const bob = createPeer(BOB, new MockTransportAdapter(), clock);
			const expired: NetworkIdentity[] = [];
			bob.session.events.on("transferExpired", ({ sender }) => expired.push(sender));

			bob.session.receive(TransferBegin.encode({ sender: ALICE, totalLength: 100 }));
			bob.session.update(9999);
			expect(bob.session.pendingTransfers).toBe(1);

			bob.session.update(10000);
			expect(expired).toEqual([ALICE]);
			expect(bob.session.pendingTransfers).toBe(0);
		});

		it("should report a failed upload", async () => {
			const clock = new Clock();
			const transport = new MockTransportAdapter();
			transport.failWith = new Error("link down");
			const alice = createPeer(ALICE, transport, clock);
			const failed = next(alice.session, "uploadFailed");

			alice.session.spray(WALL, FACING);

			expect(await failed).toEqual({ identity: ALICE, error: transport.failWith });
			expect(alice.session.stats.sendFailures).toBe(2);
		});
	});

	describe("entities", () => {
		it("should replicate an entity at the replication rate", () => {
			const { clock, alice, bob } = pair();
			const spawned: SyncEvents["entitySpawned"][] = [];
			bob.session.events.on("entitySpawned", (event) => spawned.push(event));

			const rocket = alice.session.spawnEntity("rocket");
			expect(spawned).toEqual([{ netId: rocket.netId, kind: "rocket", owner: ALICE }]);

			rocket.setTransform({ x: 3, y: 0, z: 1.5 }, { x: 0, y: 0, z: 0 });
			clock.time = 30;
			alice.session.update(30);
			expect(bob.session.replicator.get(rocket.netId)?.sequence).toBe(1);

			clock.time = 62.5;
			alice.session.update(62.5);
			expect(bob.session.replicator.get(rocket.netId)?.sequence).toBe(2);

			clock.time = 125;
			bob.session.update(125);
			expect(bob.bodies.bodies.get(rocket.netId)?.lastTransform?.position).toEqual({ x: 3, y: 0, z: 1.5 });
		});

		it("should move ownership between peers", () => {
			const { alice, bob } = pair();
			const changes: SyncEvents["ownershipChanged"][] = [];
			bob.session.events.on("ownershipChanged", (event) => changes.push(event));
			const rocket = alice.session.spawnEntity("rocket");

			expect(alice.session.transferOwnership(rocket.netId, BOB)).toBe(true);

			expect(rocket.isOwner).toBe(false);
			expect(bob.session.replicator.get(rocket.netId)?.isOwner).toBe(true);
			expect(alice.bodies.bodies.get(rocket.netId)?.authoritative).toBe(false);
			expect(bob.bodies.bodies.get(rocket.netId)?.authoritative).toBe(true);
			expect(changes).toEqual([{ netId: rocket.netId, previousOwner: ALICE, owner: BOB }]);
		});

		it("should kill an entity on every peer", () => {
			const { alice, bob } = pair();
			const killed: SyncEvents["entityKilled"][] = [];
			alice.session.events.on("entityKilled", (event) => killed.push(event));
			const cannonball = alice.session.spawnEntity("cannonball");

			expect(bob.session.killEntity(cannonball.netId)).toBe(true);

			expect(cannonball.alive).toBe(false);
			expect(alice.bodies.bodies.get(cannonball.netId)?.destroyedWith).toEqual(["shatter"]);
			expect(killed).toEqual([{ netId: cannonball.netId, kind: "cannonball" }]);
		});

		it("should drop a malformed snapshot without throwing", () => {
			const { bob } = pair();

			expect(bob.session.receive(new Uint8Array([PacketKind.EntitySnapshot, 1, 2]))).toBe(false);
			expect(bob.sink.messages("warn")).toEqual([
				"[SyncSession 00000000000000b0:Router] Dropping EntitySnapshot packet: DecodeError: Read past end of packet: need 4 bytes at offset 1, length is 3",
			]);
		});
	});

	describe("membership", () => {
		it("should forget everything about a departed peer", async () => {
			const { alice, bob } = pair();
			const assigned = next(bob.session, "assetAssigned");
			alice.session.spray(WALL, FACING);
			await assigned;
			const rocket = alice.session.spawnEntity("rocket");
			const left = next(bob.session, "playerLeft");

			alice.transport.close();

			expect(await left).toEqual({ identity: ALICE });
			expect(bob.session.directory.has(ALICE)).toBe(false);
			expect(bob.session.replicator.size).toBe(0);
			expect(bob.bodies.bodies.get(rocket.netId)?.destroyedWith).toEqual(["explode"]);
		});

		it("should keep what other peers sent when one departs", async () => {
			const { hub, clock, alice, bob } = pair();
			const carol = onHub(hub, CAROL, clock);
			const assigned: NetworkIdentity[] = [];
			const bothAssigned = new Promise<void>((resolve) => {
				bob.session.events.on("assetAssigned", ({ owner }) => {
					assigned.push(owner);
					if (assigned.length === 2) resolve();
				});
			});

			alice.session.spray(WALL, FACING);
			carol.session.spray(WALL, FACING);
			await bothAssigned;
			alice.session.spawnEntity("rocket");
			const cannonball = carol.session.spawnEntity("cannonball");
			const left = next(bob.session, "playerLeft");

			alice.transport.close();
			await left;

			expect(bob.session.directory.has(ALICE)).toBe(false);
			expect(bob.session.directory.get(CAROL)?.image).toEqual({ text: "tag-192" });
			expect(bob.session.replicator.all().map((entity) => entity.netId)).toEqual([cannonball.netId]);
			expect(bob.session.replicator.get(cannonball.netId)?.alive).toBe(true);
		});

		it("should ignore membership changes about itself", () => {
			const { alice } = pair();
			const joined: NetworkIdentity[] = [];
			alice.session.events.on("playerJoined", ({ identity }) => joined.push(identity));

			alice.session.playerJoined(ALICE);
			alice.session.playerJoined(CAROL);

			expect(joined).toEqual([CAROL]);
		});

		it("should refuse work once closed", async () => {
			const { alice, bob } = pair();
			const left = next(bob.session, "playerLeft");

			await alice.session.close();

			expect(alice.session.isClosed).toBe(true);
			expect(alice.transport.isClosed).toBe(true);
			expect(alice.session.receive(new Uint8Array([PacketKind.EntityKill, 1, 0, 0, 0]))).toBe(false);
			expect(await left).toEqual({ identity: ALICE });
		});
	});
});
