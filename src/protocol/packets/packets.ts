import { BinaryPrimitives, PacketReader, PacketWriter, type NetworkIdentity } from "../../core/binary-codec/binary-codec";
import { ProtocolError } from "../../core/errors/errors";
import { definePacket } from "./define-packet";
import { PACKET_KIND_SIZE, PacketKind } from "./packet-kind";

/** Payload bytes carried by one transfer chunk. */
export const CHUNK_SIZE = 240;

/** Largest asset accepted for transfer (512 KiB). */
export const MAX_ASSET_SIZE = 512 * 1024;

/**
 * Announces an upload: `[kind][sender u64][totalLength u32]`, 13 bytes.
 */
export const TransferBegin = definePacket({
	kind: PacketKind.TransferBegin,
	schema: {
		sender: BinaryPrimitives.identity,
		totalLength: BinaryPrimitives.u32,
	},
});
export type TransferBegin = typeof TransferBegin.type;

/**
 * Asks `target` to restart its upload, sent when a chunk arrived without a
 * begin packet.
 */
export const TransferResync = definePacket({
	kind: PacketKind.TransferResync,
	schema: {
		requester: BinaryPrimitives.identity,
		target: BinaryPrimitives.identity,
	},
});
export type TransferResync = typeof TransferResync.type;

/**
 * A spray placed at `position` facing `direction`. 32-byte body.
 */
export const SpraySpawn = definePacket({
	kind: PacketKind.SpraySpawn,
	schema: {
		sender: BinaryPrimitives.identity,
		position: BinaryPrimitives.vec3,
		direction: BinaryPrimitives.vec3,
	},
});
export type SpraySpawn = typeof SpraySpawn.type;

/**
 * Moves authority over an entity. `kind` lets a peer that never saw the
 * entity create it. `epoch` counts transfers of the entity, so a directive
 * that arrives after a newer one is dropped.
 */
export const EntityOwnership = definePacket({
	kind: PacketKind.EntityOwnership,
	schema: {
		netId: BinaryPrimitives.u32,
		entityKind: BinaryPrimitives.u8,
		owner: BinaryPrimitives.identity,
		sequence: BinaryPrimitives.u32,
		epoch: BinaryPrimitives.u32,
	},
});
export type EntityOwnership = typeof EntityOwnership.type;

/**
 * Destroys an entity on every peer.
 */
export const EntityKill = definePacket({
	kind: PacketKind.EntityKill,
	schema: {
		netId: BinaryPrimitives.u32,
	},
});
export type EntityKill = typeof EntityKill.type;

/**
 * Decoded transfer chunk.
 */
export interface TransferChunk {
	sender: NetworkIdentity;
	data: Uint8Array;
}

/** Kind byte + sender id */
export const TRANSFER_CHUNK_HEADER_SIZE = PACKET_KIND_SIZE + BinaryPrimitives.identity.size;

/**
 * Encodes `[kind][sender u64][payload[offset .. offset + n]]` with
 * `n = min(chunkSize, payload.length - offset)`.
 */
export function encodeTransferChunk(
	sender: NetworkIdentity,
	payload: Uint8Array,
	offset: number,
	chunkSize: number = CHUNK_SIZE
): Uint8Array {
	const length = Math.min(chunkSize, payload.byteLength - offset);
	if (length <= 0) {
		throw new RangeError(`No payload left at offset ${offset} of ${payload.byteLength}`);
	}

	const writer = new PacketWriter(TRANSFER_CHUNK_HEADER_SIZE + length);
	writer.u8(PacketKind.TransferChunk);
	writer.identity(sender);
	writer.bytes(payload, offset, length);
	return writer.finish();
}

/**
 * Decodes a transfer chunk. Everything after the sender id is payload.
 */
export function decodeTransferChunk(packet: Uint8Array): TransferChunk {
	const reader = new PacketReader(packet);
	const kind = reader.u8();
	if (kind !== PacketKind.TransferChunk) {
		throw new ProtocolError(`Expected TransferChunk packet, got kind ${kind}`);
	}

	const sender = reader.identity();
	return { sender, data: reader.bytes(reader.remaining) };
}
