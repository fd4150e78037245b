import type { NetworkIdentity, Vec3 } from "../core/binary-codec/binary-codec";
import { describeError } from "../core/errors/errors";
import { EventSystem } from "../core/events/event-system";
import { FixedTicker } from "../core/fixed-ticker/fixed-ticker";
import { formatIdentity } from "../core/generate-id/generate-id";
import { REPLICATION_RATE } from "../core/interpolator/interpolator";
import { Logger, type LogSink } from "../core/logger/logger";
import { EntityDirectory, type ImageDecoder } from "../directory/entity-directory";
import { PacketBroadcaster } from "../net/broadcaster";
import { PacketRouter } from "../net/packet-router";
import type { MembershipSource, NetworkStats, TransportAdapter } from "../net/types";
import { PacketKind } from "../protocol/packets/packet-kind";
import { CHUNK_SIZE, MAX_ASSET_SIZE } from "../protocol/packets/packets";
import type { EntityKind } from "../replication/entity-kind";
import { EntityReplicator, type EntityBodyFactory } from "../replication/entity-replicator";
import type { OwnableEntity } from "../replication/ownable-entity";
import {
	REPLACED_DECAL_LIFETIME,
	SprayService,
	type DecalFactory,
	type LocalSprayResult,
	type SpraySource,
	type UserNotifier,
} from "../sprays/spray-service";
import { DEFAULT_TRANSFER_DEADLINE_MS, TransferAssembler } from "../transfer/transfer-assembler";
import { UploadWorker } from "../transfer/upload-worker";
import type { SyncEvents } from "./events";

/**
 * Tunables of a session.
 */
export interface SyncSessionOptions {
	/** Print debug and info logs (default: false) */
	debug?: boolean;

	/** Largest asset sent or accepted, in bytes (default: 512 KiB) */
	maxAssetSize?: number;

	/** Payload bytes per transfer chunk (default: 240) */
	chunkSize?: number;

	/** Inactivity deadline of an incoming transfer (default: 10000 ms) */
	transferDeadlineMs?: number;

	/** Snapshots per second for owned entities (default: 16) */
	replicationRate?: number;

	/** Show sprays of other players (default: true) */
	remoteSpraysEnabled?: boolean;

	/** Seconds a replaced decal stays in the world (default: 3) */
	replacedDecalLifetime?: number;

	/** Packets longer than this are dropped unread (default: 64KB) */
	maxMessageSize?: number;

	/** Millisecond clock (default: performance.now) */
	now?: () => number;
}

/**
 * Collaborators of a session.
 */
export interface SyncSessionConfig<TImage> extends SyncSessionOptions {
	localIdentity: NetworkIdentity;
	transport: TransportAdapter;
	/** Join/leave notifications; without it call `playerJoined`/`playerLeft` directly */
	membership?: MembershipSource;
	decoder: ImageDecoder<TImage>;
	decals: DecalFactory<TImage>;
	bodies: EntityBodyFactory;
	source: SpraySource;
	notifier?: UserNotifier;
	logSink?: LogSink;
}

/**
 * @description
 * One peer's side of a replicated session.
 *
 * Wires the transport to the packet handlers and owns every table: pending
 * transfers, cached assets and entities. Every inbound packet and membership
 * notification is processed on the caller's event loop, in arrival order;
 * only uploads run as background jobs.
 *
 * The host drives it with `update(now)` once per frame.
 *
 * @example
 * ```ts
 * const session = new SyncSession({
 *   localIdentity,
 *   transport,
 *   membership: transport,
 *   decoder: { decode: sniffImage },
 *   decals,
 *   bodies,
 *   source: library,
 * });
 *
 * session.events.on("assetAssigned", ({ owner }) => console.log(owner));
 * session.spray(position, direction);
 * setInterval(() => session.update(performance.now()), 16);
 * ```
 */
export class SyncSession<TImage> {
	readonly localIdentity: NetworkIdentity;
	readonly events: EventSystem<SyncEvents>;
	readonly directory: EntityDirectory<TImage>;
	readonly replicator: EntityReplicator;
	readonly sprays: SprayService<TImage>;

	private readonly options: Required<Omit<SyncSessionOptions, "debug" | "remoteSpraysEnabled">>;
	private readonly transport: TransportAdapter;
	private readonly logger: Logger;
	private readonly broadcaster: PacketBroadcaster;
	private readonly router: PacketRouter;
	private readonly assembler: TransferAssembler;
	private readonly uploads: UploadWorker;
	private readonly ticker: FixedTicker;
	private lastUpdateAt: number;
	private closed = false;

	constructor(config: SyncSessionConfig<TImage>) {
		this.localIdentity = config.localIdentity;
		this.transport = config.transport;
		this.options = {
			maxAssetSize: config.maxAssetSize ?? MAX_ASSET_SIZE,
			chunkSize: config.chunkSize ?? CHUNK_SIZE,
			transferDeadlineMs: config.transferDeadlineMs ?? DEFAULT_TRANSFER_DEADLINE_MS,
			replicationRate: config.replicationRate ?? REPLICATION_RATE,
			replacedDecalLifetime: config.replacedDecalLifetime ?? REPLACED_DECAL_LIFETIME,
			maxMessageSize: config.maxMessageSize ?? 65536,
			now: config.now ?? (() => performance.now()),
		};

		this.logger = new Logger(`SyncSession ${formatIdentity(config.localIdentity)}`, {
			debug: config.debug ?? false,
			sink: config.logSink,
		});
		this.events = new EventSystem<SyncEvents>({ logger: this.logger.child("Events") });
		this.broadcaster = new PacketBroadcaster(this.transport, this.logger.child("Broadcaster"));
		this.router = new PacketRouter({
			maxMessageSize: this.options.maxMessageSize,
			logger: this.logger.child("Router"),
		});

		this.assembler = new TransferAssembler({
			maxLength: this.options.maxAssetSize,
			chunkSize: this.options.chunkSize,
			deadlineMs: this.options.transferDeadlineMs,
			logger: this.logger.child("TransferAssembler"),
		});

		this.directory = new EntityDirectory({
			decoder: config.decoder,
			logger: this.logger.child("EntityDirectory"),
		});

		this.uploads = new UploadWorker({
			send: (packet) => this.broadcaster.send(packet),
			chunkSize: this.options.chunkSize,
			maxAssetSize: this.options.maxAssetSize,
			onComplete: (identity) => this.sprays.uploadFinished(identity),
			onError: (identity, error) => this.events.emit("uploadFailed", { identity, error }),
			logger: this.logger.child("UploadWorker"),
		});

		this.replicator = new EntityReplicator({
			localIdentity: this.localIdentity,
			bodies: config.bodies,
			broadcaster: this.broadcaster,
			interval: 1000 / this.options.replicationRate,
			onSpawned: (entity) => this.events.emit("entitySpawned", describeEntity(entity)),
			onKilled: (entity) => this.events.emit("entityKilled", { netId: entity.netId, kind: entity.kind }),
			onOwnershipChanged: (entity, previousOwner) =>
				this.events.emit("ownershipChanged", { netId: entity.netId, previousOwner, owner: entity.owner }),
			logger: this.logger.child("EntityReplicator"),
		});

		this.sprays = new SprayService({
			localIdentity: this.localIdentity,
			directory: this.directory,
			assembler: this.assembler,
			uploads: this.uploads,
			broadcaster: this.broadcaster,
			source: config.source,
			decals: config.decals,
			notifier: config.notifier,
			maxAssetSize: this.options.maxAssetSize,
			remoteSpraysEnabled: config.remoteSpraysEnabled,
			replacedDecalLifetime: this.options.replacedDecalLifetime,
			onAssetAssigned: (owner, asset) =>
				this.events.emit("assetAssigned", { owner, size: asset.bytes?.byteLength ?? 0 }),
			onTransferLost: (sender) => this.events.emit("transferLost", { sender }),
			logger: this.logger.child("SprayService"),
		});

		this.ticker = new FixedTicker({
			rate: this.options.replicationRate,
			onTick: () => this.replicator.broadcastSnapshots(),
			onTickSkipped: (skipped) => this.logger.debug(`Skipped ${skipped} replication ticks`),
		});
		this.lastUpdateAt = this.options.now();

		this.registerRoutes();
		this.setupTransportHandlers(config.membership);
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get stats(): NetworkStats {
		return this.broadcaster.stats;
	}

	/** Incoming transfers still being reassembled */
	get pendingTransfers(): number {
		return this.assembler.size;
	}

	/** True while the local asset is being uploaded */
	get isUploading(): boolean {
		return this.uploads.isUploading(this.localIdentity);
	}

	/**
	 * Processes one inbound packet. Never throws.
	 * @returns true if a handler accepted it
	 */
	receive(packet: Uint8Array): boolean {
		if (this.closed) return false;
		return this.router.dispatch(packet);
	}

	/**
	 * Per-frame step: drops stalled transfers, paces snapshots of owned
	 * entities and moves remote entities along their interpolation.
	 */
	update(now: number = this.options.now()): void {
		if (this.closed) return;

		const elapsed = now - this.lastUpdateAt;
		this.lastUpdateAt = now;

		for (const sender of this.assembler.expire(now)) {
			this.events.emit("transferExpired", { sender });
		}

		this.ticker.advance(elapsed);
		this.replicator.tick(now);
	}

	/** Places the local player's spray. */
	spray(position: Vec3, direction: Vec3): LocalSprayResult<TImage> {
		return this.sprays.createLocalSpray(position, direction);
	}

	spawnEntity(kind: EntityKind, position?: Vec3, rotation?: Vec3): OwnableEntity {
		return this.replicator.spawnLocal(kind, this.options.now(), position, rotation);
	}

	transferOwnership(netId: number, newOwner: NetworkIdentity): boolean {
		return this.replicator.transferOwnership(netId, newOwner, this.options.now());
	}

	killEntity(netId: number): boolean {
		return this.replicator.kill(netId, this.options.now());
	}

	/**
	 * A participant joined: it cannot have seen earlier assets, so every
	 * cached asset is dropped and sprays will be uploaded again.
	 */
	playerJoined(identity: NetworkIdentity): void {
		if (this.closed || identity === this.localIdentity) return;

		this.logger.debug(`${formatIdentity(identity)} joined, clearing cached assets`);
		this.sprays.reset();
		this.events.emit("playerJoined", { identity });
	}

	/**
	 * A participant left: its transfer, cached asset and entities go, before
	 * any further packet is processed.
	 */
	playerLeft(identity: NetworkIdentity): void {
		if (this.closed || identity === this.localIdentity) return;

		this.logger.debug(`${formatIdentity(identity)} left`);
		this.sprays.forget(identity);
		this.replicator.removeOwner(identity, this.options.now());
		this.events.emit("playerLeft", { identity });
	}

	/** The local scene was reloaded: cached assets no longer match any decal. */
	sceneChanged(): void {
		this.sprays.reset();
	}

	/**
	 * Stops uploads and waits for them, then drops every table and closes
	 * the transport.
	 */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		this.uploads.cancelAll();
		await this.uploads.join();

		this.assembler.clear();
		this.directory.reset();
		this.replicator.clear();
		this.events.clear();

		await this.transport.close();
		this.logger.debug("Session closed");
	}

	private registerRoutes(): void {
		this.router.on(PacketKind.TransferBegin, (packet) =>
			this.sprays.handleTransferBegin(packet, this.options.now())
		);
		this.router.on(PacketKind.TransferChunk, (packet) =>
			this.sprays.handleTransferChunk(packet, this.options.now())
		);
		this.router.on(PacketKind.TransferResync, (packet) => this.sprays.handleResync(packet));
		this.router.on(PacketKind.SpraySpawn, (packet) => this.sprays.handleSpawn(packet));
		this.router.on(PacketKind.EntitySnapshot, (packet) => {
			this.replicator.handleSnapshot(packet, this.options.now());
		});
		this.router.on(PacketKind.EntityOwnership, (packet) => {
			this.replicator.handleOwnership(packet, this.options.now());
		});
		this.router.on(PacketKind.EntityKill, (packet) => {
			this.replicator.handleKill(packet, this.options.now());
		});
	}

	private setupTransportHandlers(membership: MembershipSource | undefined): void {
		this.transport.onMessage((packet) => {
			this.receive(packet);
		});

		this.transport.onClose(() => {
			this.logger.info("Transport closed");
		});

		this.transport.onError?.((error) => {
			this.logger.error(`Transport error: ${describeError(error)}`);
		});

		membership?.onPlayerJoined((identity) => this.playerJoined(identity));
		membership?.onPlayerLeft((identity) => this.playerLeft(identity));
	}
}

function describeEntity(entity: OwnableEntity): SyncEvents["entitySpawned"] {
	return { netId: entity.netId, kind: entity.kind, owner: entity.owner };
}
