import { describe, expect, it } from "vitest";
import { payloadOf, testLogger } from "../testing/fakes";
import { CHUNK_SIZE, MAX_ASSET_SIZE } from "../protocol/packets/packets";
import { TransferAssembler, type AppendResult } from "./transfer-assembler";

const SENDER = 0xaan;
const OTHER = 0xbbn;

function quietAssembler(deadlineMs?: number): TransferAssembler {
	return new TransferAssembler({ deadlineMs, logger: testLogger().logger });
}

/** Feeds `payload` through begin + chunks and returns the last result */
function transfer(assembler: TransferAssembler, payload: Uint8Array): Uint8Array | undefined {
	const begin = assembler.begin(SENDER, payload.byteLength, 0);
	if (begin.status === "completed") return begin.payload;

	let last: AppendResult | undefined;
	for (let offset = 0; offset < payload.byteLength; offset += CHUNK_SIZE) {
		last = assembler.append(SENDER, payload.subarray(offset, offset + CHUNK_SIZE), 0);
	}
	return last?.status === "completed" ? last.payload : undefined;
}

describe("TransferAssembler", () => {
	describe("reassembly", () => {
		it.each([0, 1, CHUNK_SIZE, CHUNK_SIZE + 1, MAX_ASSET_SIZE])(
			"should reconstruct a payload of %i bytes exactly",
			(length) => {
				const assembler = quietAssembler();
				const payload = payloadOf(length);

				const result = transfer(assembler, payload);

				expect(result).toEqual(payload);
				expect(assembler.size).toBe(0);
			}
		);

		it("should report progress until the last chunk", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 300, 0);

			expect(assembler.append(SENDER, payloadOf(240), 0)).toEqual({
				status: "progress",
				sender: SENDER,
				received: 240,
				totalLength: 300,
			});
			expect(assembler.progress(SENDER)).toEqual({ received: 240, totalLength: 300 });
		});

		it("should keep transfers of different senders apart", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 2, 0);
			assembler.begin(OTHER, 2, 0);

			assembler.append(SENDER, new Uint8Array([1]), 0);
			assembler.append(OTHER, new Uint8Array([9]), 0);
			const result = assembler.append(SENDER, new Uint8Array([2]), 0);

			expect(result.status === "completed" && [...result.payload]).toEqual([1, 2]);
			expect(assembler.progress(OTHER)).toEqual({ received: 1, totalLength: 2 });
		});

		it("should remove the entry when the payload completes", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 1, 0);
			assembler.append(SENDER, new Uint8Array([1]), 0);

			expect(assembler.has(SENDER)).toBe(false);
			expect(assembler.append(SENDER, new Uint8Array([2]), 0).status).toBe("orphaned");
		});
	});

	describe("begin", () => {
		it("should complete an empty transfer without a pending entry", () => {
			const assembler = quietAssembler();
			const result = assembler.begin(SENDER, 0, 0);

			expect(result.status).toBe("completed");
			expect(assembler.has(SENDER)).toBe(false);
		});

		it("should reject a length above the ceiling", () => {
			const assembler = quietAssembler();
			const result = assembler.begin(SENDER, MAX_ASSET_SIZE + 1, 0);

			expect(result.status).toBe("rejected");
			expect(assembler.size).toBe(0);
		});

		it("should reject a second begin and leave the pending transfer untouched", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 10, 0);
			assembler.append(SENDER, payloadOf(4), 0);

			const second = assembler.begin(SENDER, 50, 0);

			expect(second.status).toBe("rejected");
			expect(assembler.progress(SENDER)).toEqual({ received: 4, totalLength: 10 });
		});

		it("should accept a new begin once the transfer was cancelled", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 10, 0);

			expect(assembler.cancel(SENDER)).toBe(true);
			expect(assembler.begin(SENDER, 20, 0).status).toBe("started");
			expect(assembler.cancel(OTHER)).toBe(false);
		});
	});

	describe("append", () => {
		it("should report a chunk without a begin as orphaned and create nothing", () => {
			const { logger, sink } = testLogger("Assembler");
			const assembler = new TransferAssembler({ logger });

			const result = assembler.append(SENDER, payloadOf(10), 0);

			expect(result).toEqual({ status: "orphaned", sender: SENDER });
			expect(assembler.size).toBe(0);
			expect(sink.messages("warn")).toEqual([
				"[Assembler] Initial packet of the transfer from 00000000000000aa was lost",
			]);
		});

		it("should not let an orphan chunk corrupt another sender's transfer", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 3, 0);
			assembler.append(OTHER, new Uint8Array([7, 7, 7]), 0);

			expect(assembler.progress(SENDER)).toEqual({ received: 0, totalLength: 3 });
		});

		it("should drop the transfer on a chunk that overflows the announced length", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 10, 0);
			assembler.append(SENDER, payloadOf(6), 0);

			const result = assembler.append(SENDER, payloadOf(5), 0);

			expect(result.status === "rejected" && result.cancelled).toBe(true);
			expect(assembler.has(SENDER)).toBe(false);
		});

		it("should drop the transfer on a chunk larger than the chunk size", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 1000, 0);

			const result = assembler.append(SENDER, payloadOf(CHUNK_SIZE + 1), 0);

			expect(result.status).toBe("rejected");
			expect(assembler.has(SENDER)).toBe(false);
		});

		it("should reject an empty chunk without dropping the transfer", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 10, 0);

			const result = assembler.append(SENDER, new Uint8Array(0), 0);

			expect(result.status === "rejected" && result.cancelled).toBe(false);
			expect(assembler.has(SENDER)).toBe(true);
		});
	});

	describe("expire", () => {
		it("should drop transfers that made no progress before the deadline", () => {
			const assembler = quietAssembler(1000);
			assembler.begin(SENDER, 10, 0);
			assembler.begin(OTHER, 10, 500);

			expect(assembler.expire(999)).toEqual([]);
			expect(assembler.expire(1000)).toEqual([SENDER]);
			expect(assembler.has(OTHER)).toBe(true);
		});

		it("should push the deadline back on every accepted chunk", () => {
			const assembler = quietAssembler(1000);
			assembler.begin(SENDER, 10, 0);
			assembler.append(SENDER, payloadOf(2), 900);

			expect(assembler.expire(1500)).toEqual([]);
			expect(assembler.expire(1900)).toEqual([SENDER]);
		});

		it("should default to a ten second deadline", () => {
			const assembler = quietAssembler();
			assembler.begin(SENDER, 10, 0);

			expect(assembler.expire(9999)).toEqual([]);
			expect(assembler.expire(10000)).toEqual([SENDER]);
		});
	});

	it("should clear every pending transfer", () => {
		const assembler = quietAssembler();
		assembler.begin(SENDER, 10, 0);
		assembler.begin(OTHER, 10, 0);
		assembler.clear();

		expect(assembler.size).toBe(0);
	});
});
