import type { NetworkIdentity } from "../core/binary-codec/binary-codec";
import { ProtocolError } from "../core/errors/errors";
import { formatIdentity } from "../core/generate-id/generate-id";
import { Logger } from "../core/logger/logger";
import { CHUNK_SIZE, MAX_ASSET_SIZE } from "../protocol/packets/packets";

/** Default inactivity deadline of a pending transfer. */
export const DEFAULT_TRANSFER_DEADLINE_MS = 10_000;

/**
 * Reassembly state of one sender's upload.
 */
interface PendingTransfer {
	sender: NetworkIdentity;
	totalLength: number;
	buffer: Uint8Array;
	writeOffset: number;
	/** Clock time after which the transfer is dropped */
	deadline: number;
}

export type BeginResult =
	| { status: "started"; sender: NetworkIdentity; totalLength: number }
	| { status: "completed"; sender: NetworkIdentity; payload: Uint8Array }
	| { status: "rejected"; sender: NetworkIdentity; error: ProtocolError };

export type AppendResult =
	| { status: "progress"; sender: NetworkIdentity; received: number; totalLength: number }
	| { status: "completed"; sender: NetworkIdentity; payload: Uint8Array }
	/** No begin packet was seen for this sender: the initial packet was lost */
	| { status: "orphaned"; sender: NetworkIdentity }
	| { status: "rejected"; sender: NetworkIdentity; error: ProtocolError; cancelled: boolean };

export interface TransferAssemblerConfig {
	/** Largest accepted total length (default: 512 KiB) */
	maxLength?: number;

	/** Largest accepted chunk payload (default: 240) */
	chunkSize?: number;

	/**
	 * Milliseconds without progress after which a pending transfer is
	 * dropped by `expire` (default: 10000). Refreshed by every accepted chunk.
	 */
	deadlineMs?: number;

	logger?: Logger;
}

/**
 * Reassembles one payload per sender from a length announcement followed by
 * ordered chunks.
 *
 * The pending-transfer table is owned here and mutated only through these
 * methods, all of which are meant to run on the receive path. Every method
 * validates before it mutates, so a rejected packet leaves the table as it was.
 *
 * Chunks are assumed to arrive in send order (the transport keeps per-sender
 * order); there is no out-of-order reassembly.
 *
 * @example
 * ```ts
 * const assembler = new TransferAssembler();
 * assembler.begin(sender, 300, now);           // { status: "started" }
 * assembler.append(sender, first240, now);     // { status: "progress", received: 240 }
 * assembler.append(sender, last60, now);       // { status: "completed", payload }
 * ```
 */
export class TransferAssembler {
	private readonly pending = new Map<NetworkIdentity, PendingTransfer>();
	private readonly config: Required<Omit<TransferAssemblerConfig, "logger">>;
	private readonly logger: Logger;

	constructor(config: TransferAssemblerConfig = {}) {
		this.config = {
			maxLength: config.maxLength ?? MAX_ASSET_SIZE,
			chunkSize: config.chunkSize ?? CHUNK_SIZE,
			deadlineMs: config.deadlineMs ?? DEFAULT_TRANSFER_DEADLINE_MS,
		};
		this.logger = config.logger ?? new Logger("TransferAssembler");
	}

	/** Number of pending transfers */
	get size(): number {
		return this.pending.size;
	}

	has(sender: NetworkIdentity): boolean {
		return this.pending.has(sender);
	}

	/**
	 * Bytes received so far for a sender's pending transfer.
	 */
	progress(sender: NetworkIdentity): { received: number; totalLength: number } | undefined {
		const transfer = this.pending.get(sender);
		if (!transfer) return undefined;
		return { received: transfer.writeOffset, totalLength: transfer.totalLength };
	}

	/**
	 * Starts a transfer. A pending transfer is never overwritten: it has to
	 * complete or be cancelled first.
	 */
	begin(sender: NetworkIdentity, totalLength: number, now: number): BeginResult {
		if (!Number.isInteger(totalLength) || totalLength < 0 || totalLength > this.config.maxLength) {
			return this.rejectBegin(
				sender,
				`Transfer from ${formatIdentity(sender)} announces ${totalLength} bytes, limit is ${this.config.maxLength}`
			);
		}

		if (this.pending.has(sender)) {
			return this.rejectBegin(
				sender,
				`Transfer from ${formatIdentity(sender)} is already pending`
			);
		}

		if (totalLength === 0) {
			this.logger.debug(`Empty transfer from ${formatIdentity(sender)} completed`);
			return { status: "completed", sender, payload: new Uint8Array(0) };
		}

		this.pending.set(sender, {
			sender,
			totalLength,
			buffer: new Uint8Array(totalLength),
			writeOffset: 0,
			deadline: now + this.config.deadlineMs,
		});

		this.logger.debug(`Transfer from ${formatIdentity(sender)} started, ${totalLength} bytes`);
		return { status: "started", sender, totalLength };
	}

	/**
	 * Appends the next chunk of a sender's transfer.
	 * On the final chunk the payload is returned and the entry removed in the same call.
	 */
	append(sender: NetworkIdentity, chunk: Uint8Array, now: number): AppendResult {
		const transfer = this.pending.get(sender);
		if (!transfer) {
			this.logger.warn(`Initial packet of the transfer from ${formatIdentity(sender)} was lost`);
			return { status: "orphaned", sender };
		}

		if (chunk.byteLength === 0) {
			return this.rejectAppend(sender, `Empty chunk from ${formatIdentity(sender)}`, false);
		}

		const remaining = transfer.totalLength - transfer.writeOffset;
		if (chunk.byteLength > this.config.chunkSize || chunk.byteLength > remaining) {
			this.pending.delete(sender);
			return this.rejectAppend(
				sender,
				`Chunk of ${chunk.byteLength} bytes from ${formatIdentity(sender)} overflows the transfer (${remaining} bytes remaining, chunk limit ${this.config.chunkSize})`,
				true
			);
		}

		transfer.buffer.set(chunk, transfer.writeOffset);
		transfer.writeOffset += chunk.byteLength;
		transfer.deadline = now + this.config.deadlineMs;

		if (transfer.writeOffset === transfer.totalLength) {
			this.pending.delete(sender);
			this.logger.debug(`Transfer from ${formatIdentity(sender)} finished with ${transfer.totalLength} bytes`);
			return { status: "completed", sender, payload: transfer.buffer };
		}

		return {
			status: "progress",
			sender,
			received: transfer.writeOffset,
			totalLength: transfer.totalLength,
		};
	}

	/**
	 * Drops a sender's pending transfer.
	 * @returns true if there was one
	 */
	cancel(sender: NetworkIdentity): boolean {
		const cancelled = this.pending.delete(sender);
		if (cancelled) {
			this.logger.debug(`Transfer from ${formatIdentity(sender)} cancelled`);
		}
		return cancelled;
	}

	/**
	 * Drops every transfer whose deadline passed.
	 * @returns The senders whose transfers were dropped
	 */
	expire(now: number): NetworkIdentity[] {
		const expired: NetworkIdentity[] = [];
		for (const [sender, transfer] of this.pending) {
			if (now >= transfer.deadline) expired.push(sender);
		}

		for (const sender of expired) {
			const transfer = this.pending.get(sender);
			this.pending.delete(sender);
			this.logger.warn(
				`Transfer from ${formatIdentity(sender)} timed out at ${transfer?.writeOffset ?? 0}/${transfer?.totalLength ?? 0} bytes`
			);
		}

		return expired;
	}

	/** Drops every pending transfer. */
	clear(): void {
		this.pending.clear();
	}

	private rejectBegin(sender: NetworkIdentity, message: string): BeginResult {
		const error = new ProtocolError(message);
		this.logger.warn(message);
		return { status: "rejected", sender, error };
	}

	private rejectAppend(sender: NetworkIdentity, message: string, cancelled: boolean): AppendResult {
		const error = new ProtocolError(message);
		this.logger.warn(cancelled ? `${message}; transfer dropped` : message);
		return { status: "rejected", sender, error, cancelled };
	}
}
