/**
 * One-byte discriminator at the start of every packet.
 */
export enum PacketKind {
	/** Peer -> all: announces the total length of an upcoming asset */
	TransferBegin = 0x01,
	/** Peer -> all: one slice of an asset */
	TransferChunk = 0x02,
	/** Peer -> all: asks one peer to restart its asset upload */
	TransferResync = 0x03,
	/** Peer -> all: a spray was placed */
	SpraySpawn = 0x04,
	/** Owner -> all: full entity state */
	EntitySnapshot = 0x05,
	/** Any -> all: entity authority moves to a new owner */
	EntityOwnership = 0x06,
	/** Any -> all: entity is destroyed */
	EntityKill = 0x07,
}

/** Size of the kind prefix */
export const PACKET_KIND_SIZE = 1;

/**
 * Reads the kind byte of a raw packet, or `undefined` if the byte is not a known kind.
 */
export function readPacketKind(packet: Uint8Array): PacketKind | undefined {
	if (packet.byteLength < PACKET_KIND_SIZE) return undefined;
	const kind = packet[0];
	return isPacketKind(kind) ? kind : undefined;
}

function isPacketKind(value: number): value is PacketKind {
	return value in PacketKind;
}
