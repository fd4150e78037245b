import type { NetworkIdentity } from "../core/binary-codec/binary-codec";
import { ResourceError, SyncError } from "../core/errors/errors";
import { formatIdentity } from "../core/generate-id/generate-id";
import { Logger } from "../core/logger/logger";

/**
 * Image decode collaborator (bytes -> drawable image).
 * Zero-length input must yield a placeholder, not an error.
 */
export interface ImageDecoder<TImage> {
	decode(bytes: Uint8Array): TImage;
}

/**
 * A live decal in the world, owned by the renderer.
 */
export interface DecalHandle<TImage> {
	applyImage(image: TImage): void;
	/** Schedules the decal's removal after `seconds` */
	setLifetime(seconds: number): void;
}

/**
 * Cached side-state of one participant: the last asset received from it and
 * the decal it currently has in the world.
 */
export class CachedAsset<TImage> {
	readonly owner: NetworkIdentity;
	private _bytes: Uint8Array | null = null;
	private _image: TImage | null = null;
	private _decal: DecalHandle<TImage> | null = null;
	private _revoked = false;

	constructor(owner: NetworkIdentity) {
		this.owner = owner;
	}

	get bytes(): Uint8Array | null {
		return this._bytes;
	}

	get image(): TImage | null {
		return this._image;
	}

	get decal(): DecalHandle<TImage> | null {
		return this._decal;
	}

	/** True once the directory dropped this entry; a revoked entry is never handed out again */
	get revoked(): boolean {
		return this._revoked;
	}

	/** True once bytes were assigned */
	get loaded(): boolean {
		return this._bytes !== null;
	}

	/**
	 * Makes `decal` the owner's live decal, pushing the cached image onto it.
	 * @returns The decal it replaces, if any
	 */
	attachDecal(decal: DecalHandle<TImage>): DecalHandle<TImage> | null {
		const previous = this._decal;
		this._decal = decal;
		if (this._image !== null) decal.applyImage(this._image);
		return previous;
	}

	/** @internal */
	store(bytes: Uint8Array, image: TImage): void {
		this._bytes = bytes;
		this._image = image;
		this._decal?.applyImage(image);
	}

	/** @internal */
	revoke(): void {
		this._revoked = true;
	}
}

export interface EntityDirectoryConfig<TImage> {
	decoder: ImageDecoder<TImage>;
	logger?: Logger;
}

/**
 * @description
 * `NetworkIdentity -> CachedAsset` table with membership-driven invalidation.
 *
 * - `reset()` drops everything: a newcomer cannot have seen earlier broadcasts,
 *   so nobody's cache can be trusted to match theirs.
 * - `remove(owner)` drops one participant's entry when it leaves.
 *
 * Dropped entries are revoked, and `get`/`getOrCreate` only ever return
 * entries still in the table.
 *
 * @example
 * ```ts
 * const directory = new EntityDirectory({ decoder: { decode: sniffImage } });
 * directory.getOrCreate(owner).attachDecal(decal);
 * directory.assign(owner, payload); // decal shows the image right away
 * ```
 */
export class EntityDirectory<TImage> {
	private readonly entries = new Map<NetworkIdentity, CachedAsset<TImage>>();
	private readonly decoder: ImageDecoder<TImage>;
	private readonly logger: Logger;

	constructor(config: EntityDirectoryConfig<TImage>) {
		this.decoder = config.decoder;
		this.logger = config.logger ?? new Logger("EntityDirectory");
	}

	/** Number of cached entries */
	get size(): number {
		return this.entries.size;
	}

	has(owner: NetworkIdentity): boolean {
		return this.entries.has(owner);
	}

	get(owner: NetworkIdentity): CachedAsset<TImage> | undefined {
		return this.entries.get(owner);
	}

	getOrCreate(owner: NetworkIdentity): CachedAsset<TImage> {
		let entry = this.entries.get(owner);
		if (!entry) {
			entry = new CachedAsset(owner);
			this.entries.set(owner, entry);
		}
		return entry;
	}

	/**
	 * Decodes `bytes` and stores them as `owner`'s asset, updating the owner's
	 * live decal if there is one.
	 *
	 * @throws ResourceError if the bytes do not decode; the table is unchanged
	 */
	assign(owner: NetworkIdentity, bytes: Uint8Array): CachedAsset<TImage> {
		const image = this.decode(owner, bytes);
		const entry = this.getOrCreate(owner);
		entry.store(bytes, image);

		this.logger.debug(`Assigned ${bytes.byteLength} bytes to ${formatIdentity(owner)}`);
		return entry;
	}

	/** Drops every entry. */
	reset(): void {
		for (const entry of this.entries.values()) {
			entry.revoke();
		}
		this.entries.clear();
		this.logger.debug("Cache reset");
	}

	/**
	 * Drops one participant's entry.
	 * @returns true if there was one
	 */
	remove(owner: NetworkIdentity): boolean {
		const entry = this.entries.get(owner);
		if (!entry) return false;

		entry.revoke();
		this.entries.delete(owner);
		return true;
	}

	private decode(owner: NetworkIdentity, bytes: Uint8Array): TImage {
		try {
			return this.decoder.decode(bytes);
		} catch (error) {
			if (error instanceof SyncError && error.category === "resource") throw error;
			throw new ResourceError(`Asset of ${formatIdentity(owner)} could not be decoded`, { cause: error });
		}
	}
}
