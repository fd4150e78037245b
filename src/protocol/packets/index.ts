export { PacketKind, PACKET_KIND_SIZE, readPacketKind } from "./packet-kind";
export { definePacket } from "./define-packet";
export type { DefinedPacket, PacketDefinition } from "./define-packet";
export {
	CHUNK_SIZE,
	MAX_ASSET_SIZE,
	TRANSFER_CHUNK_HEADER_SIZE,
	TransferBegin,
	TransferResync,
	SpraySpawn,
	EntityOwnership,
	EntityKill,
	encodeTransferChunk,
	decodeTransferChunk,
} from "./packets";
export type { TransferChunk } from "./packets";
