import {
	BinaryPrimitives,
	type NetworkIdentity,
	type PacketReader,
	type PacketWriter,
	type Vec3,
} from "../core/binary-codec/binary-codec";
import { DecodeError, describeError } from "../core/errors/errors";
import { formatIdentity } from "../core/generate-id/generate-id";
import { Interpolator, REPLICATION_INTERVAL_MS } from "../core/interpolator/interpolator";
import { Logger } from "../core/logger/logger";
import { capabilitiesOf, entityKindFromCode, type DestroyEffect, type EntityCapabilities, type EntityKind } from "./entity-kind";

/**
 * Rendered placement of an entity. `attachedTo` names the player the entity
 * is parented to (a passenger riding it), in which case `position` and
 * `rotation` are local to that player.
 */
export interface EntityTransform {
	position: Vec3;
	rotation: Vec3;
	attachedTo: NetworkIdentity | null;
}

/**
 * Physics and rendering collaborator of one entity.
 * Calls go one way: the entity never reads anything back.
 */
export interface EntityBody {
	/** True when this peer drives the simulation (kinematic body and solid collider otherwise off) */
	setAuthority(authoritative: boolean): void;
	/** Non-owner transform, applied every tick */
	applyTransform(transform: EntityTransform): void;
	/** Armed kinds: keeps the local physics from detonating an entity it does not own */
	setDetonationSuppressed?(suppressed: boolean): void;
	/** Armed kinds: owner froze the entity in place */
	setFrozen?(frozen: boolean): void;
	/** Runs the kind's destroy effect. Explosions are always harmless; damage is the owner's business */
	destroy(effect: DestroyEffect): void;
}

/** `Owned(self) | Owned(remote) | Dead` */
export type EntityState = "owned-local" | "owned-remote" | "dead";

export interface EntitySnapshotHeader {
	netId: number;
	kind: EntityKind;
	owner: NetworkIdentity;
	sequence: number;
}

/**
 * Fully decoded snapshot, staged before anything is applied.
 */
export interface EntitySnapshot extends EntitySnapshotHeader {
	position: Vec3;
	rotation: Vec3;
	/** Present for kinds with armed flags */
	flags?: { riding: boolean; frozen: boolean };
}

/**
 * Ownership as carried by a transfer directive.
 */
export interface OwnershipStamp {
	/** Sequence the new owner continues from */
	sequence: number;
	/** Number of transfers the entity went through */
	epoch: number;
}

export type ApplyResult =
	| { applied: true }
	| { applied: false; reason: "dead" | "owner" | "mismatch" | "not-owner" | "stale" | "decode" };

/** netId + kind + owner + sequence */
export const SNAPSHOT_HEADER_SIZE =
	BinaryPrimitives.u32.size + BinaryPrimitives.u8.size + BinaryPrimitives.identity.size + BinaryPrimitives.u32.size;

const TRANSFORM_SIZE = 2 * BinaryPrimitives.vec3.size;
const FLAGS_SIZE = 2 * BinaryPrimitives.bool.size;

/** Local offset of a rocket carrying its owner */
const RIDING_OFFSET: Vec3 = { x: 0, y: 0, z: -1 };

/**
 * Body size of a snapshot of the given kind (packet kind byte excluded).
 */
export function snapshotBodySize(kind: EntityKind): number {
	return SNAPSHOT_HEADER_SIZE + TRANSFORM_SIZE + (capabilitiesOf(kind).armedFlags ? FLAGS_SIZE : 0);
}

/**
 * Decodes a snapshot body in wire order. The reader must be positioned right
 * after the packet kind byte.
 *
 * @throws DecodeError on a short packet, an unknown kind or trailing bytes
 */
export function readEntitySnapshot(reader: PacketReader): EntitySnapshot {
	const netId = reader.u32();
	const code = reader.u8();
	const kind = entityKindFromCode(code);
	if (kind === undefined) {
		throw new DecodeError(`Unknown entity kind code ${code}`);
	}

	const owner = reader.identity();
	const sequence = reader.u32();
	const position = reader.vec3();
	const rotation = reader.vec3();

	const snapshot: EntitySnapshot = { netId, kind, owner, sequence, position, rotation };
	if (capabilitiesOf(kind).armedFlags) {
		snapshot.flags = { riding: reader.bool(), frozen: reader.bool() };
	}

	if (reader.remaining !== 0) {
		throw new DecodeError(`Snapshot of ${kind} ${netId} has ${reader.remaining} trailing bytes`);
	}

	return snapshot;
}

/**
 * True when sequence `a` comes after `b`, allowing for u32 wrap-around.
 */
export function isNewerSequence(a: number, b: number): boolean {
	const delta = (a - b) >>> 0;
	return delta !== 0 && delta < 0x80000000;
}

export interface OwnableEntityOptions {
	netId: number;
	kind: EntityKind;
	owner: NetworkIdentity;
	/** Identity of the peer running this instance */
	localIdentity: NetworkIdentity;
	body: EntityBody;
	/** Clock time of creation */
	now: number;
	position?: Vec3;
	rotation?: Vec3;
	/** Last sequence known for this entity (default: 0) */
	sequence?: number;
	/** Ownership epoch known for this entity (default: 0) */
	epoch?: number;
	/** Interpolation interval (default: replication interval) */
	interval?: number;
	logger?: Logger;
}

/**
 * @description
 * A replicated object with exactly one authoritative owner.
 *
 * The owner mutates the true state and periodically writes full snapshots.
 * Every other peer reads them: transform components go through interpolators
 * to avoid popping, flags apply at once. Ownership moves only through
 * `transferOwnership`, which reconciles the physics authority flags in the
 * same call, so no tick ever observes two owners or none.
 *
 * Wire layout written by `write` and read by `read`:
 * ```
 * [netId u32][kind u8][owner u64][sequence u32][position vec3][rotation vec3][riding bool][frozen bool]
 *                                                                            └── armed kinds only ──┘
 * ```
 */
export class OwnableEntity {
	readonly netId: number;
	readonly kind: EntityKind;
	readonly capabilities: EntityCapabilities;
	readonly localIdentity: NetworkIdentity;

	private _owner: NetworkIdentity;
	private _alive = true;
	private _sequence: number;
	private _epoch: number;
	private readonly body: EntityBody;
	private readonly logger: Logger;

	private readonly x: Interpolator;
	private readonly y: Interpolator;
	private readonly z: Interpolator;
	private readonly rx: Interpolator;
	private readonly ry: Interpolator;
	private readonly rz: Interpolator;

	private _position: Vec3;
	private _rotation: Vec3;
	private _attachedTo: NetworkIdentity | null = null;
	private _riding = false;
	private _frozen = false;
	private _detonationSuppressed = false;

	constructor(options: OwnableEntityOptions) {
		this.netId = options.netId;
		this.kind = options.kind;
		this.capabilities = capabilitiesOf(options.kind);
		this.localIdentity = options.localIdentity;
		this._owner = options.owner;
		this._sequence = options.sequence ?? 0;
		this._epoch = options.epoch ?? 0;
		this.body = options.body;
		this.logger = options.logger ?? new Logger("OwnableEntity");

		const interval = options.interval ?? REPLICATION_INTERVAL_MS;
		this.x = new Interpolator(interval);
		this.y = new Interpolator(interval);
		this.z = new Interpolator(interval);
		this.rx = new Interpolator(interval);
		this.ry = new Interpolator(interval);
		this.rz = new Interpolator(interval);

		this._position = { ...(options.position ?? { x: 0, y: 0, z: 0 }) };
		this._rotation = { ...(options.rotation ?? { x: 0, y: 0, z: 0 }) };
		this.snapInterpolators(options.now);
		this.reconcileAuthority();
	}

	get owner(): NetworkIdentity {
		return this._owner;
	}

	get isOwner(): boolean {
		return this._alive && this._owner === this.localIdentity;
	}

	get alive(): boolean {
		return this._alive;
	}

	get state(): EntityState {
		if (!this._alive) return "dead";
		return this._owner === this.localIdentity ? "owned-local" : "owned-remote";
	}

	/** Last sequence written (owner) or applied (non-owner) */
	get sequence(): number {
		return this._sequence;
	}

	/** Transfers seen so far; bumped by every local transfer */
	get epoch(): number {
		return this._epoch;
	}

	get position(): Vec3 {
		return { ...this._position };
	}

	get rotation(): Vec3 {
		return { ...this._rotation };
	}

	get transform(): EntityTransform {
		return { position: this.position, rotation: this.rotation, attachedTo: this._attachedTo };
	}

	get riding(): boolean {
		return this._riding;
	}

	get frozen(): boolean {
		return this._frozen;
	}

	get detonationSuppressed(): boolean {
		return this._detonationSuppressed;
	}

	/** Body size of this entity's snapshots */
	get snapshotSize(): number {
		return snapshotBodySize(this.kind);
	}

	/**
	 * Moves authority to `newOwner`.
	 *
	 * Without a stamp the transfer starts here and opens a new epoch. With one
	 * it comes from a directive: a stamp whose epoch is not newer than the
	 * current one is dropped, and the sequence never moves backwards.
	 *
	 * @returns false if the entity is dead, the stamp is stale or nothing changed
	 */
	transferOwnership(newOwner: NetworkIdentity, now: number, stamp?: OwnershipStamp): boolean {
		if (!this._alive) return false;

		if (stamp) {
			if (!isNewerSequence(stamp.epoch, this._epoch)) {
				this.logger.debug(`Entity ${this.netId}: dropping ownership epoch ${stamp.epoch}, at ${this._epoch}`);
				return false;
			}
			this._epoch = stamp.epoch >>> 0;
			if (isNewerSequence(stamp.sequence, this._sequence)) this._sequence = stamp.sequence >>> 0;
		}

		if (newOwner === this._owner) return false;
		if (!stamp) this._epoch = (this._epoch + 1) >>> 0;

		const previous = this._owner;
		this._owner = newOwner;
		this.snapInterpolators(now);
		this.reconcileAuthority();

		this.logger.debug(
			`Entity ${this.netId} moved from ${formatIdentity(previous)} to ${formatIdentity(newOwner)}`
		);
		return true;
	}

	/**
	 * Owner only: sets the true transform.
	 * @returns false (and changes nothing) on a non-owner or dead entity
	 */
	setTransform(position: Vec3, rotation: Vec3): boolean {
		if (!this.requireOwner("setTransform")) return false;
		this._position = { ...position };
		this._rotation = { ...rotation };
		return true;
	}

	/** Owner only: a passenger is riding the entity. */
	setRiding(riding: boolean): boolean {
		if (!this.capabilities.armedFlags || !this.requireOwner("setRiding")) return false;
		this._riding = riding;
		return true;
	}

	/** Owner only: the entity is frozen in place. */
	setFrozen(frozen: boolean): boolean {
		if (!this.capabilities.armedFlags || !this.requireOwner("setFrozen")) return false;
		this._frozen = frozen;
		this.body.setFrozen?.(frozen);
		return true;
	}

	/**
	 * Per-frame update on non-owners: pulls the transform out of the
	 * interpolators, or pins the entity to its rider.
	 */
	tick(now: number): void {
		if (!this._alive || this.isOwner) return;

		if (this._riding) {
			this._position = { ...RIDING_OFFSET };
			this._rotation = { x: 0, y: 0, z: 0 };
			this._attachedTo = this._owner;
		} else {
			this._position = { x: this.x.get(now), y: this.y.get(now), z: this.z.get(now) };
			this._rotation = { x: this.rx.getAngle(now), y: this.ry.getAngle(now), z: this.rz.getAngle(now) };
			this._attachedTo = null;
		}

		this.body.applyTransform(this.transform);
	}

	/**
	 * Writes a full snapshot body from the logically current values.
	 * Each write by the owner advances the sequence.
	 */
	write(writer: PacketWriter): void {
		if (this.isOwner) this._sequence = (this._sequence + 1) >>> 0;

		writer.u32(this.netId);
		writer.u8(this.capabilities.code);
		writer.identity(this._owner);
		writer.u32(this._sequence);
		writer.vec3(this._position);
		writer.vec3(this._rotation);

		if (this.capabilities.armedFlags) {
			writer.bool(this._riding);
			writer.bool(this._frozen);
		}
	}

	/**
	 * Inverse of `write`. A snapshot that fails to decode is discarded and
	 * the entity keeps its last known state.
	 */
	read(reader: PacketReader, now: number): ApplyResult {
		let snapshot: EntitySnapshot;
		try {
			snapshot = readEntitySnapshot(reader);
		} catch (error) {
			this.logger.warn(`Discarding snapshot for entity ${this.netId}: ${describeError(error)}`);
			return { applied: false, reason: "decode" };
		}

		return this.apply(snapshot, now);
	}

	/**
	 * Applies a decoded snapshot. Snapshots are ignored by the owner, and
	 * discarded when they come from anyone but the current owner or are
	 * older than the last one applied.
	 */
	apply(snapshot: EntitySnapshot, now: number): ApplyResult {
		if (!this._alive) return { applied: false, reason: "dead" };
		if (this.isOwner) return { applied: false, reason: "owner" };

		if (snapshot.netId !== this.netId || snapshot.kind !== this.kind) {
			this.logger.warn(`Snapshot for ${snapshot.kind} ${snapshot.netId} routed to ${this.kind} ${this.netId}`);
			return { applied: false, reason: "mismatch" };
		}

		if (snapshot.owner !== this._owner) {
			this.logger.debug(
				`Entity ${this.netId}: dropping snapshot from ${formatIdentity(snapshot.owner)}, owner is ${formatIdentity(this._owner)}`
			);
			return { applied: false, reason: "not-owner" };
		}

		if (!isNewerSequence(snapshot.sequence, this._sequence)) {
			return { applied: false, reason: "stale" };
		}

		this._sequence = snapshot.sequence;
		this.x.set(snapshot.position.x, now);
		this.y.set(snapshot.position.y, now);
		this.z.set(snapshot.position.z, now);
		this.rx.set(snapshot.rotation.x, now);
		this.ry.set(snapshot.rotation.y, now);
		this.rz.set(snapshot.rotation.z, now);

		if (snapshot.flags && this.capabilities.armedFlags) {
			this._riding = snapshot.flags.riding;
			if (this._frozen !== snapshot.flags.frozen) {
				this._frozen = snapshot.flags.frozen;
				this.body.setFrozen?.(this._frozen);
			}
		}

		return { applied: true };
	}

	/**
	 * Destroys the entity. Idempotent: a second call does nothing.
	 *
	 * Armed kinds clear detonation suppression first, so the destroy effect
	 * sees the same armed state whichever peer triggered the kill.
	 *
	 * @returns true if this call killed the entity
	 */
	kill(): boolean {
		if (!this._alive) return false;
		this._alive = false;

		if (this.capabilities.armedFlags) {
			this.setDetonationSuppressed(false);
		}

		this.body.destroy(this.capabilities.destroyEffect);
		this.logger.debug(`Entity ${this.netId} killed`);
		return true;
	}

	private reconcileAuthority(): void {
		const authoritative = this._owner === this.localIdentity;
		this.body.setAuthority(authoritative);

		if (this.capabilities.armedFlags) {
			this.setDetonationSuppressed(!authoritative);
		}

		if (authoritative) this._attachedTo = null;
	}

	private setDetonationSuppressed(suppressed: boolean): void {
		this._detonationSuppressed = suppressed;
		this.body.setDetonationSuppressed?.(suppressed);
	}

	private snapInterpolators(now: number): void {
		this.x.snap(this._position.x, now);
		this.y.snap(this._position.y, now);
		this.z.snap(this._position.z, now);
		this.rx.snap(this._rotation.x, now);
		this.ry.snap(this._rotation.y, now);
		this.rz.snap(this._rotation.z, now);
	}

	private requireOwner(operation: string): boolean {
		if (this.isOwner) return true;
		this.logger.warn(`${operation} on entity ${this.netId} refused: ${formatIdentity(this.localIdentity)} is not its owner`);
		return false;
	}
}
