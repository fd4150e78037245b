/**
 * Protocol Layer - fixed-layout packets
 *
 * Every packet is `[kind u8][body]`. Bodies are written field by field, in
 * declaration order, little-endian, with no tags.
 *
 * @example
 * ```ts
 * import { TransferBegin, PacketKind, readPacketKind } from './protocol';
 *
 * const packet = TransferBegin.encode({ sender: localId, totalLength: 1024 });
 * readPacketKind(packet); // PacketKind.TransferBegin
 * TransferBegin.decode(packet); // { sender: localId, totalLength: 1024 }
 * ```
 */

export * from "./packets";
