import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { NetworkIdentity } from "../core/binary-codec/binary-codec";
import { CapacityError, describeError } from "../core/errors/errors";
import { formatIdentity } from "../core/generate-id/generate-id";
import { Logger } from "../core/logger/logger";
import { CHUNK_SIZE, MAX_ASSET_SIZE, TransferBegin, encodeTransferChunk } from "../protocol/packets/packets";

/**
 * Outward send primitive. An async transport returns a promise that settles
 * once the packet was handed off.
 */
export type PacketSender = (packet: Uint8Array) => void | Promise<void>;

export interface UploadWorkerConfig {
	send: PacketSender;

	/** Payload bytes per chunk (default: 240) */
	chunkSize?: number;

	/** Largest payload accepted (default: 512 KiB) */
	maxAssetSize?: number;

	/** Chunks sent between two yields to the event loop (default: 16) */
	chunksPerYield?: number;

	/** Called when an upload fails; the job is over at that point */
	onError?: (identity: NetworkIdentity, error: unknown) => void;

	/** Called when the last chunk of an upload was sent */
	onComplete?: (identity: NetworkIdentity, totalLength: number) => void;

	logger?: Logger;
}

interface UploadJob {
	controller: AbortController;
	done: Promise<void>;
}

/**
 * Streams payloads out as a begin packet followed by chunks, off the
 * simulation path.
 *
 * Each upload runs as an async job that yields to the event loop between
 * batches of chunks, so a large upload never stalls packet processing. A job
 * works on its own copy of the payload and only calls `send`.
 *
 * At most one upload is in flight per identity; `enqueue` refuses a second one.
 *
 * @example
 * ```ts
 * const worker = new UploadWorker({ send: (p) => transport.send(p) });
 * worker.enqueue(localId, sprayBytes);
 * // on teardown
 * worker.cancelAll();
 * await worker.join();
 * ```
 */
export class UploadWorker {
	private readonly jobs = new Map<NetworkIdentity, UploadJob>();
	/** Cancelled jobs that may still be inside a send */
	private readonly draining = new Set<Promise<void>>();
	private readonly send: PacketSender;
	private readonly config: Required<Pick<UploadWorkerConfig, "chunkSize" | "maxAssetSize" | "chunksPerYield">>;
	private readonly onError?: UploadWorkerConfig["onError"];
	private readonly onComplete?: UploadWorkerConfig["onComplete"];
	private readonly logger: Logger;

	constructor(config: UploadWorkerConfig) {
		this.send = config.send;
		this.config = {
			chunkSize: config.chunkSize ?? CHUNK_SIZE,
			maxAssetSize: config.maxAssetSize ?? MAX_ASSET_SIZE,
			chunksPerYield: Math.max(1, config.chunksPerYield ?? 16),
		};
		this.onError = config.onError;
		this.onComplete = config.onComplete;
		this.logger = config.logger ?? new Logger("UploadWorker");
	}

	/** Number of uploads in flight */
	get size(): number {
		return this.jobs.size;
	}

	isUploading(identity: NetworkIdentity): boolean {
		return this.jobs.has(identity);
	}

	/**
	 * Schedules an upload of `payload` under `identity`.
	 *
	 * @returns false if an upload for `identity` is already in flight
	 * @throws CapacityError if the payload exceeds the size limit; nothing is sent
	 */
	enqueue(identity: NetworkIdentity, payload: Uint8Array): boolean {
		if (payload.byteLength > this.config.maxAssetSize) {
			throw new CapacityError(payload.byteLength, this.config.maxAssetSize);
		}

		if (this.jobs.has(identity)) {
			this.logger.warn(`Upload for ${formatIdentity(identity)} is already in flight`);
			return false;
		}

		const controller = new AbortController();
		const data = payload.slice();

		// The job is released before the hooks run, so they may enqueue again
		const done = this.run(identity, data, controller.signal).then(
			(finished) => {
				this.release(identity, controller);
				if (finished) this.onComplete?.(identity, data.byteLength);
			},
			(error: unknown) => {
				this.release(identity, controller);
				this.logger.error(`Upload for ${formatIdentity(identity)} failed: ${describeError(error)}`);
				this.onError?.(identity, error);
			}
		);

		this.jobs.set(identity, { controller, done });
		return true;
	}

	/**
	 * Stops an identity's upload before its next packet.
	 * @returns true if an upload was in flight
	 */
	cancel(identity: NetworkIdentity): boolean {
		const job = this.jobs.get(identity);
		if (!job) return false;

		job.controller.abort();
		this.jobs.delete(identity);
		this.draining.add(job.done);
		void job.done.finally(() => this.draining.delete(job.done));
		return true;
	}

	/** Stops every upload. */
	cancelAll(): void {
		for (const identity of [...this.jobs.keys()]) {
			this.cancel(identity);
		}
	}

	/**
	 * Resolves once every upload, cancelled ones included, has finished or stopped.
	 */
	async join(): Promise<void> {
		await Promise.all([...[...this.jobs.values()].map((job) => job.done), ...this.draining]);
	}

	private release(identity: NetworkIdentity, controller: AbortController): void {
		if (this.jobs.get(identity)?.controller === controller) {
			this.jobs.delete(identity);
		}
	}

	/** @returns false if the upload was cancelled */
	private async run(identity: NetworkIdentity, payload: Uint8Array, signal: AbortSignal): Promise<boolean> {
		await yieldToEventLoop();
		if (signal.aborted) return false;

		this.logger.debug(`Uploading ${payload.byteLength} bytes for ${formatIdentity(identity)}`);
		await this.send(TransferBegin.encode({ sender: identity, totalLength: payload.byteLength }));

		let sent = 0;
		for (let offset = 0; offset < payload.byteLength; offset += this.config.chunkSize) {
			if (signal.aborted) {
				this.logger.debug(`Upload for ${formatIdentity(identity)} cancelled at ${offset}/${payload.byteLength}`);
				return false;
			}

			await this.send(encodeTransferChunk(identity, payload, offset, this.config.chunkSize));

			if (++sent % this.config.chunksPerYield === 0) {
				await yieldToEventLoop();
			}
		}

		this.logger.debug(`Upload for ${formatIdentity(identity)} finished`);
		return true;
	}
}
