/**
 * spraynet
 *
 * Peer-replicated state for shared game sessions, including:
 * - Binary codec with fixed little-endian layouts
 * - Interpolation of transforms received at a fixed replication rate
 * - Chunked transfer of assets with reassembly and resync on a lost begin
 * - Ownership-authoritative entities with transferable authority
 * - Per-participant asset cache tied to session membership
 * - Sprays: decals whose images travel as chunked transfers
 * - Transport-agnostic packet plumbing (ws WebSocket, in-process loopback)
 */

// Core utilities
export * from "./core";

// Wire packets
export * from "./protocol";

// Packet plumbing and transports
export * from "./net";

// Chunked transfers
export * from "./transfer/transfer-assembler";
export * from "./transfer/upload-worker";

// Replicated entities
export * from "./replication/entity-kind";
export * from "./replication/ownable-entity";
export * from "./replication/entity-replicator";

// Cached assets
export * from "./directory/entity-directory";

// Sprays
export * from "./sprays/image-sniffer";
export * from "./sprays/spray-library";
export * from "./sprays/spray-service";

// Session
export * from "./session/events";
export * from "./session/sync-session";
