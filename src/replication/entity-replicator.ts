import { PacketReader, type NetworkIdentity, type Vec3 } from "../core/binary-codec/binary-codec";
import { DecodeError, ProtocolError } from "../core/errors/errors";
import { formatIdentity, generateNetId } from "../core/generate-id/generate-id";
import { REPLICATION_INTERVAL_MS } from "../core/interpolator/interpolator";
import { Logger } from "../core/logger/logger";
import type { PacketBroadcaster } from "../net/broadcaster";
import { PacketKind } from "../protocol/packets/packet-kind";
import { EntityKill, EntityOwnership } from "../protocol/packets/packets";
import { DEFAULT_TRANSFER_DEADLINE_MS } from "../transfer/transfer-assembler";
import { entityKindFromCode, type EntityKind } from "./entity-kind";
import {
	OwnableEntity,
	readEntitySnapshot,
	type ApplyResult,
	type EntityBody,
	type EntitySnapshot,
	type OwnershipStamp,
} from "./ownable-entity";

/** How long a killed id keeps late snapshots and directives out */
export const TOMBSTONE_TTL_MS = DEFAULT_TRANSFER_DEADLINE_MS + 4 * REPLICATION_INTERVAL_MS;

/**
 * Creates the physics/render body of an entity this peer learns about.
 */
export interface EntityBodyFactory {
	create(netId: number, kind: EntityKind, owner: NetworkIdentity): EntityBody;
}

export interface EntityReplicatorConfig {
	localIdentity: NetworkIdentity;
	bodies: EntityBodyFactory;
	broadcaster: PacketBroadcaster;

	/** Interpolation interval handed to every entity (default: replication interval) */
	interval?: number;

	/** Milliseconds a killed id is remembered (default: {@link TOMBSTONE_TTL_MS}) */
	tombstoneTtl?: number;

	onSpawned?: (entity: OwnableEntity) => void;
	onKilled?: (entity: OwnableEntity) => void;
	onOwnershipChanged?: (entity: OwnableEntity, previousOwner: NetworkIdentity) => void;

	logger?: Logger;
}

/**
 * @description
 * Owns the `netId -> OwnableEntity` table of one peer.
 *
 * Local operations apply to the table first and then broadcast the matching
 * directive; inbound packets are decoded in full before the table is touched.
 * An inbound packet naming an unknown `netId` creates the entity through the
 * body factory. Killed ids are remembered for a while so that a late
 * snapshot cannot bring an entity back; `tick` forgets the old ones.
 */
export class EntityReplicator {
	private readonly entities = new Map<number, OwnableEntity>();
	/** netId -> time of the kill */
	private readonly killed = new Map<number, number>();
	private readonly localIdentity: NetworkIdentity;
	private readonly bodies: EntityBodyFactory;
	private readonly broadcaster: PacketBroadcaster;
	private readonly interval: number;
	private readonly tombstoneTtl: number;
	private readonly hooks: Pick<EntityReplicatorConfig, "onSpawned" | "onKilled" | "onOwnershipChanged">;
	private readonly logger: Logger;

	constructor(config: EntityReplicatorConfig) {
		this.localIdentity = config.localIdentity;
		this.bodies = config.bodies;
		this.broadcaster = config.broadcaster;
		this.interval = config.interval ?? REPLICATION_INTERVAL_MS;
		this.tombstoneTtl = config.tombstoneTtl ?? TOMBSTONE_TTL_MS;
		this.hooks = {
			onSpawned: config.onSpawned,
			onKilled: config.onKilled,
			onOwnershipChanged: config.onOwnershipChanged,
		};
		this.logger = config.logger ?? new Logger("EntityReplicator");
	}

	/** Number of live entities */
	get size(): number {
		return this.entities.size;
	}

	/** Number of killed ids still remembered */
	get tombstones(): number {
		return this.killed.size;
	}

	get(netId: number): OwnableEntity | undefined {
		return this.entities.get(netId);
	}

	/** Live entities, in creation order */
	all(): OwnableEntity[] {
		return [...this.entities.values()];
	}

	/** Live entities owned by `owner` */
	ownedBy(owner: NetworkIdentity): OwnableEntity[] {
		return this.all().filter((entity) => entity.owner === owner);
	}

	/**
	 * Spawns an entity owned by this peer and broadcasts its first snapshot,
	 * which creates it everywhere else.
	 */
	spawnLocal(kind: EntityKind, now: number, position?: Vec3, rotation?: Vec3): OwnableEntity {
		let netId = generateNetId();
		while (this.entities.has(netId) || this.killed.has(netId)) {
			netId = generateNetId();
		}

		const entity = this.register(netId, kind, this.localIdentity, now, { sequence: 0, epoch: 0 }, position, rotation);
		this.broadcastSnapshot(entity);
		return entity;
	}

	/**
	 * Hands an entity to `newOwner` locally and tells every other peer.
	 * @returns false if the entity is unknown, dead or already owned by `newOwner`
	 */
	transferOwnership(netId: number, newOwner: NetworkIdentity, now: number): boolean {
		const entity = this.entities.get(netId);
		if (!entity) {
			this.logger.warn(`Cannot transfer unknown entity ${netId}`);
			return false;
		}

		const previousOwner = entity.owner;
		if (!entity.transferOwnership(newOwner, now)) return false;

		this.broadcaster.broadcastPacket(EntityOwnership, {
			netId,
			entityKind: entity.capabilities.code,
			owner: newOwner,
			sequence: entity.sequence,
			epoch: entity.epoch,
		});
		this.hooks.onOwnershipChanged?.(entity, previousOwner);
		return true;
	}

	/**
	 * Kills an entity locally and on every other peer.
	 * @returns false if the entity is unknown or already dead
	 */
	kill(netId: number, now: number): boolean {
		if (!this.destroy(netId, now)) return false;
		this.broadcaster.broadcastPacket(EntityKill, { netId });
		return true;
	}

	/**
	 * Broadcasts a snapshot of every entity this peer owns.
	 * @returns Number of snapshots sent
	 */
	broadcastSnapshots(): number {
		let sent = 0;
		for (const entity of this.entities.values()) {
			if (!entity.isOwner) continue;
			this.broadcastSnapshot(entity);
			sent++;
		}
		return sent;
	}

	/** Advances every remote entity's rendered transform and drops expired tombstones. */
	tick(now: number): void {
		for (const entity of this.entities.values()) {
			entity.tick(now);
		}

		for (const [netId, killedAt] of this.killed) {
			if (now - killedAt >= this.tombstoneTtl) this.killed.delete(netId);
		}
	}

	/**
	 * Kills, locally only, every entity owned by a departed peer.
	 * @returns The killed ids
	 */
	removeOwner(owner: NetworkIdentity, now: number): number[] {
		const removed: number[] = [];
		for (const entity of this.ownedBy(owner)) {
			if (this.destroy(entity.netId, now)) removed.push(entity.netId);
		}

		if (removed.length > 0) {
			this.logger.debug(`Removed ${removed.length} entities of ${formatIdentity(owner)}`);
		}
		return removed;
	}

	/** Forgets every entity without running destroy effects. */
	clear(): void {
		this.entities.clear();
		this.killed.clear();
	}

	/**
	 * Handles an `EntitySnapshot` packet.
	 * @throws DecodeError if the packet does not decode; nothing is changed
	 */
	handleSnapshot(packet: Uint8Array, now: number): ApplyResult {
		const reader = new PacketReader(packet);
		const kind = reader.u8();
		if (kind !== PacketKind.EntitySnapshot) {
			throw new ProtocolError(`Expected EntitySnapshot packet, got kind ${kind}`);
		}

		const snapshot = readEntitySnapshot(reader);
		const entity = this.entities.get(snapshot.netId);
		if (entity) return entity.apply(snapshot, now);

		if (this.killed.has(snapshot.netId)) return { applied: false, reason: "dead" };

		if (snapshot.owner === this.localIdentity) {
			this.logger.warn(`Snapshot claims unknown entity ${snapshot.netId} is ours`);
			return { applied: false, reason: "owner" };
		}

		return this.spawnFromSnapshot(snapshot, now);
	}

	/**
	 * Handles an `EntityOwnership` directive.
	 * @throws ProtocolError or DecodeError if the packet does not decode; nothing is changed
	 */
	handleOwnership(packet: Uint8Array, now: number): boolean {
		const directive = EntityOwnership.decode(packet);
		const kind = entityKindFromCode(directive.entityKind);
		if (kind === undefined) {
			throw new DecodeError(`Unknown entity kind code ${directive.entityKind}`);
		}

		if (this.killed.has(directive.netId)) return false;

		const stamp = { sequence: directive.sequence, epoch: directive.epoch };
		const entity = this.entities.get(directive.netId);
		if (!entity) {
			if (directive.owner === this.localIdentity) {
				this.logger.warn(`Ownership directive hands us unknown entity ${directive.netId}`);
				return false;
			}
			this.register(directive.netId, kind, directive.owner, now, stamp);
			return true;
		}

		if (entity.kind !== kind) {
			this.logger.warn(`Ownership directive names ${kind} ${directive.netId}, entity is a ${entity.kind}`);
			return false;
		}

		const previousOwner = entity.owner;
		if (!entity.transferOwnership(directive.owner, now, stamp)) return false;

		this.hooks.onOwnershipChanged?.(entity, previousOwner);
		return true;
	}

	/**
	 * Handles an `EntityKill` directive.
	 */
	handleKill(packet: Uint8Array, now: number): boolean {
		const { netId } = EntityKill.decode(packet);
		const destroyed = this.destroy(netId, now);
		this.killed.set(netId, now);
		return destroyed;
	}

	private spawnFromSnapshot(snapshot: EntitySnapshot, now: number): ApplyResult {
		// One behind, so the snapshot that announced the entity applies its flags too
		const sequence = (snapshot.sequence - 1) >>> 0;
		const entity = this.register(
			snapshot.netId,
			snapshot.kind,
			snapshot.owner,
			now,
			{ sequence, epoch: 0 },
			snapshot.position,
			snapshot.rotation
		);
		return entity.apply(snapshot, now);
	}

	private register(
		netId: number,
		kind: EntityKind,
		owner: NetworkIdentity,
		now: number,
		stamp: OwnershipStamp,
		position?: Vec3,
		rotation?: Vec3
	): OwnableEntity {
		const entity = new OwnableEntity({
			netId,
			kind,
			owner,
			localIdentity: this.localIdentity,
			body: this.bodies.create(netId, kind, owner),
			now,
			position,
			rotation,
			sequence: stamp.sequence,
			epoch: stamp.epoch,
			interval: this.interval,
			logger: this.logger,
		});

		this.entities.set(netId, entity);
		this.logger.debug(`Spawned ${kind} ${netId} owned by ${formatIdentity(owner)}`);
		this.hooks.onSpawned?.(entity);
		return entity;
	}

	private destroy(netId: number, now: number): boolean {
		const entity = this.entities.get(netId);
		if (!entity) return false;

		this.entities.delete(netId);
		this.killed.set(netId, now);
		if (!entity.kill()) return false;

		this.hooks.onKilled?.(entity);
		return true;
	}

	private broadcastSnapshot(entity: OwnableEntity): void {
		this.broadcaster.broadcast(PacketKind.EntitySnapshot, entity.snapshotSize, (writer) => entity.write(writer));
	}
}
