import type { NetworkIdentity, Vec3 } from "../core/binary-codec/binary-codec";
import { CapacityError, ResourceError, SyncError, describeError } from "../core/errors/errors";
import { formatIdentity } from "../core/generate-id/generate-id";
import { Logger } from "../core/logger/logger";
import type { CachedAsset, DecalHandle, EntityDirectory } from "../directory/entity-directory";
import type { PacketBroadcaster } from "../net/broadcaster";
import {
	MAX_ASSET_SIZE,
	SpraySpawn,
	TransferBegin,
	TransferResync,
	decodeTransferChunk,
} from "../protocol/packets/packets";
import type { TransferAssembler } from "../transfer/transfer-assembler";
import type { UploadWorker } from "../transfer/upload-worker";
import type { SprayFile } from "./spray-library";

/** Seconds a replaced decal stays in the world */
export const REPLACED_DECAL_LIFETIME = 3;

/**
 * UI notification collaborator.
 */
export interface UserNotifier {
	notify(message: string): void;
}

/**
 * Spawns decals in the world.
 */
export interface DecalFactory<TImage> {
	spawn(owner: NetworkIdentity, position: Vec3, direction: Vec3): DecalHandle<TImage>;
}

/**
 * Where the local spray comes from, usually a {@link SprayLibrary}.
 */
export interface SpraySource {
	readonly current: SprayFile | null;
}

export type LocalSprayResult<TImage> =
	| { status: "spawned"; asset: CachedAsset<TImage>; uploading: boolean }
	| { status: "rejected"; error: SyncError };

export interface SprayServiceConfig<TImage> {
	localIdentity: NetworkIdentity;
	directory: EntityDirectory<TImage>;
	assembler: TransferAssembler;
	uploads: UploadWorker;
	broadcaster: PacketBroadcaster;
	source: SpraySource;
	decals: DecalFactory<TImage>;
	notifier?: UserNotifier;

	/** Largest local asset sent (default: 512 KiB) */
	maxAssetSize?: number;

	/** Show sprays of other players (default: true) */
	remoteSpraysEnabled?: boolean;

	/** Seconds a replaced decal stays (default: 3) */
	replacedDecalLifetime?: number;

	onAssetAssigned?: (owner: NetworkIdentity, asset: CachedAsset<TImage>) => void;
	/** A chunk arrived without its begin packet */
	onTransferLost?: (sender: NetworkIdentity) => void;

	logger?: Logger;
}

/**
 * @description
 * Sprays: one decal per player, whose image travels as a chunked transfer.
 *
 * Placing a spray broadcasts a spawn packet; the image follows only when the
 * sender has no cached asset of its own yet, since a cached asset means
 * everyone present already received it. Receivers render the decal at once
 * and push the image onto it when the transfer completes.
 *
 * A chunk that arrives with no pending transfer means the begin packet was
 * lost. The receiver then asks the sender, once until its next begin, to
 * upload again.
 */
export class SprayService<TImage> {
	remoteSpraysEnabled: boolean;

	private readonly localIdentity: NetworkIdentity;
	private readonly directory: EntityDirectory<TImage>;
	private readonly assembler: TransferAssembler;
	private readonly uploads: UploadWorker;
	private readonly broadcaster: PacketBroadcaster;
	private readonly source: SpraySource;
	private readonly decals: DecalFactory<TImage>;
	private readonly notifier: UserNotifier | undefined;
	private readonly maxAssetSize: number;
	private readonly replacedDecalLifetime: number;
	private readonly hooks: Pick<SprayServiceConfig<TImage>, "onAssetAssigned" | "onTransferLost">;
	private readonly logger: Logger;

	/** Senders asked to restart, until their next begin arrives */
	private readonly resyncRequested = new Set<NetworkIdentity>();
	/** A resync request arrived while our own upload was still in flight */
	private reuploadQueued = false;

	constructor(config: SprayServiceConfig<TImage>) {
		this.localIdentity = config.localIdentity;
		this.directory = config.directory;
		this.assembler = config.assembler;
		this.uploads = config.uploads;
		this.broadcaster = config.broadcaster;
		this.source = config.source;
		this.decals = config.decals;
		this.notifier = config.notifier;
		this.maxAssetSize = config.maxAssetSize ?? MAX_ASSET_SIZE;
		this.remoteSpraysEnabled = config.remoteSpraysEnabled ?? true;
		this.replacedDecalLifetime = config.replacedDecalLifetime ?? REPLACED_DECAL_LIFETIME;
		this.hooks = { onAssetAssigned: config.onAssetAssigned, onTransferLost: config.onTransferLost };
		this.logger = config.logger ?? new Logger("SprayService");
	}

	/**
	 * Places the local player's spray and shares it.
	 *
	 * Nothing is sent when no spray is selected, when it is too big or when
	 * it does not decode; the user is told why.
	 */
	createLocalSpray(position: Vec3, direction: Vec3): LocalSprayResult<TImage> {
		const spray = this.source.current;
		if (!spray) {
			return this.reject(new ResourceError("You have not selected a spray"));
		}

		if (spray.size > this.maxAssetSize) {
			return this.reject(new CapacityError(spray.size, this.maxAssetSize));
		}

		const cached = this.directory.get(this.localIdentity);
		let bytes = spray.bytes;
		if (cached?.bytes) {
			this.notifier?.notify("There's already a cached spray");
			bytes = cached.bytes;
		}

		let asset: CachedAsset<TImage>;
		try {
			asset = this.spawnSpray(this.localIdentity, position, direction, bytes);
		} catch (error) {
			if (error instanceof SyncError) return this.reject(error);
			throw error;
		}

		this.broadcaster.broadcastPacket(SpraySpawn, { sender: this.localIdentity, position, direction });

		const uploading = !cached?.bytes && this.uploads.enqueue(this.localIdentity, bytes);
		this.logger.debug(`Spray placed${uploading ? ", uploading image" : ""}`);
		return { status: "spawned", asset, uploading };
	}

	/**
	 * Puts `owner`'s decal in the world, replacing (after a short lifetime)
	 * the one it had.
	 *
	 * @param bytes Image to assign first; without it the cached image, if any, is used
	 * @throws ResourceError if `bytes` do not decode; nothing changes
	 */
	spawnSpray(owner: NetworkIdentity, position: Vec3, direction: Vec3, bytes?: Uint8Array): CachedAsset<TImage> {
		const asset = bytes ? this.directory.assign(owner, bytes) : this.directory.getOrCreate(owner);
		asset.decal?.setLifetime(this.replacedDecalLifetime);

		if (owner !== this.localIdentity && !this.remoteSpraysEnabled) {
			this.logger.debug(`Sprays of ${formatIdentity(owner)} are hidden`);
			return asset;
		}

		asset.attachDecal(this.decals.spawn(owner, position, direction));
		return asset;
	}

	handleSpawn(packet: Uint8Array): void {
		const { sender, position, direction } = SpraySpawn.decode(packet);
		if (sender === this.localIdentity) return;
		this.spawnSpray(sender, position, direction);
	}

	handleTransferBegin(packet: Uint8Array, now: number): void {
		const { sender, totalLength } = TransferBegin.decode(packet);
		if (sender === this.localIdentity) return;

		this.resyncRequested.delete(sender);
		const result = this.assembler.begin(sender, totalLength, now);
		if (result.status === "completed") this.deliver(sender, result.payload);
	}

	handleTransferChunk(packet: Uint8Array, now: number): void {
		const { sender, data } = decodeTransferChunk(packet);
		if (sender === this.localIdentity) return;

		const result = this.assembler.append(sender, data, now);
		switch (result.status) {
			case "completed":
				this.deliver(sender, result.payload);
				break;
			case "orphaned":
				this.requestResync(sender);
				break;
		}
	}

	/**
	 * Re-uploads the local asset when a peer asks this one to.
	 */
	handleResync(packet: Uint8Array): void {
		const { requester, target } = TransferResync.decode(packet);
		if (target !== this.localIdentity) return;

		this.logger.debug(`${formatIdentity(requester)} asked for our spray again`);
		if (this.uploads.isUploading(this.localIdentity)) {
			this.reuploadQueued = true;
			return;
		}
		this.reupload();
	}

	/**
	 * Called once the local upload finished; runs a re-upload asked for meanwhile.
	 */
	uploadFinished(identity: NetworkIdentity): void {
		if (identity !== this.localIdentity || !this.reuploadQueued) return;
		this.reuploadQueued = false;
		this.reupload();
	}

	/**
	 * Drops everything known about a departed participant.
	 */
	forget(identity: NetworkIdentity): void {
		this.assembler.cancel(identity);
		this.directory.remove(identity);
		this.resyncRequested.delete(identity);
	}

	/** Drops every cached asset. */
	reset(): void {
		this.directory.reset();
	}

	private reupload(): void {
		const bytes = this.directory.get(this.localIdentity)?.bytes ?? this.source.current?.bytes;
		if (!bytes) {
			this.logger.debug("No spray to upload again");
			return;
		}

		if (bytes.byteLength > this.maxAssetSize) return;
		this.uploads.enqueue(this.localIdentity, bytes);
	}

	private requestResync(sender: NetworkIdentity): void {
		if (this.resyncRequested.has(sender)) return;

		this.resyncRequested.add(sender);
		this.broadcaster.broadcastPacket(TransferResync, { requester: this.localIdentity, target: sender });
		this.hooks.onTransferLost?.(sender);
	}

	private deliver(sender: NetworkIdentity, payload: Uint8Array): void {
		try {
			const asset = this.directory.assign(sender, payload);
			this.hooks.onAssetAssigned?.(sender, asset);
		} catch (error) {
			this.logger.warn(`Spray of ${formatIdentity(sender)} is unusable: ${describeError(error)}`);
		}
	}

	private reject(error: SyncError): LocalSprayResult<TImage> {
		this.logger.warn(error.message);
		this.notifier?.notify(error.message);
		return { status: "rejected", error };
	}
}
