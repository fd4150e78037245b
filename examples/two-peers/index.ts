import {
    LoopbackHub,
    SprayFile,
    SyncSession,
    formatIdentity,
    generateIdentity,
    sniffImage,
    type DecalFactory,
    type DecalHandle,
    type DestroyEffect,
    type EntityBody,
    type EntityBodyFactory,
    type EntityKind,
    type EntityTransform,
    type NetworkIdentity,
    type SprayImage,
    type Vec3,
} from "../../src";

// Two peers on an in-process hub: Alice sprays a tag and fires a rocket,
// hands the rocket to Bob halfway through, and Bob blows it up.

const FRAME_MS = 16;
const DEMO_MS = 1500;

/** Just enough of a PNG for the sniffer: signature and IHDR */
function fakePng(width: number, height: number): Uint8Array {
    const bytes = new Uint8Array(33);
    bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52]);
    const view = new DataView(bytes.buffer);
    view.setUint32(16, width);
    view.setUint32(20, height);
    return bytes;
}

class ConsoleDecals implements DecalFactory<SprayImage> {
    constructor(private readonly viewer: string) {}

    spawn(owner: NetworkIdentity, position: Vec3): DecalHandle<SprayImage> {
        const label = `[${this.viewer}] decal of ${formatIdentity(owner)}`;
        console.log(`${label} placed at (${position.x}, ${position.y}, ${position.z})`);
        return {
            applyImage: (image) => console.log(`${label} shows a ${image.width}x${image.height} ${image.format}`),
            setLifetime: (seconds) => console.log(`${label} fades in ${seconds}s`),
        };
    }
}

class ConsoleBodies implements EntityBodyFactory {
    constructor(private readonly viewer: string) {}

    create(netId: number, kind: EntityKind): EntityBody {
        const label = `[${this.viewer}] ${kind} ${netId}`;
        let frames = 0;
        return {
            setAuthority: (authoritative) => console.log(`${label} ${authoritative ? "simulated here" : "follows its owner"}`),
            applyTransform: ({ position }: EntityTransform) => {
                // every 10th frame is enough to watch it move
                if (frames++ % 10 === 0) console.log(`${label} at x=${position.x.toFixed(2)}`);
            },
            destroy: (effect: DestroyEffect) => console.log(`${label} destroyed (${effect})`),
        };
    }
}

function createPeer(hub: LoopbackHub, name: string, identity: NetworkIdentity, spray: SprayFile | null) {
    const transport = hub.join(identity);
    const session = new SyncSession<SprayImage>({
        localIdentity: identity,
        transport,
        membership: transport,
        decoder: { decode: sniffImage },
        decals: new ConsoleDecals(name),
        bodies: new ConsoleBodies(name),
        source: { current: spray },
        notifier: { notify: (message) => console.log(`[${name}] ${message}`) },
    });

    session.events.on("assetAssigned", ({ owner, size }) => {
        console.log(`[${name}] received ${size} bytes from ${formatIdentity(owner)}`);
    });
    session.events.on("ownershipChanged", ({ netId, owner }) => {
        console.log(`[${name}] entity ${netId} now owned by ${formatIdentity(owner)}`);
    });

    return session;
}

async function main(): Promise<void> {
    const hub = new LoopbackHub();
    const aliceId = generateIdentity();
    const bobId = generateIdentity();

    const alice = createPeer(hub, "alice", aliceId, new SprayFile("tag.png", fakePng(64, 32)));
    const bob = createPeer(hub, "bob", bobId, null);

    alice.spray({ x: 2, y: 1, z: 0 }, { x: -1, y: 0, z: 0 });
    const rocket = alice.spawnEntity("rocket");

    const startedAt = performance.now();
    let handedOver = false;

    await new Promise<void>((resolve) => {
        const timer = setInterval(() => {
            const now = performance.now();
            const elapsed = now - startedAt;

            // whoever owns the rocket keeps flying it
            for (const session of [alice, bob]) {
                const owned = session.replicator.get(rocket.netId);
                if (owned?.isOwner) owned.setTransform({ x: elapsed / 100, y: 1, z: 0 }, { x: 0, y: 90, z: 0 });
            }

            if (!handedOver && elapsed >= DEMO_MS / 2) {
                handedOver = true;
                alice.transferOwnership(rocket.netId, bobId);
            }

            alice.update(now);
            bob.update(now);

            if (elapsed >= DEMO_MS) {
                clearInterval(timer);
                resolve();
            }
        }, FRAME_MS);
    });

    bob.killEntity(rocket.netId);

    console.log("alice", alice.stats);
    console.log("bob", bob.stats);

    await alice.close();
    await bob.close();
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
