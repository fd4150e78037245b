/**
 * @module net
 *
 * Transport-agnostic packet plumbing for replicated sessions
 *
 * Key features:
 * - Framed, fire-and-forget broadcasts with send statistics
 * - Per-kind packet routing that never throws into the transport
 * - Pluggable transport adapters (`ws` WebSocket, in-process loopback)
 *
 * @example
 * ```typescript
 * import { PacketBroadcaster, PacketRouter, WebSocketTransport } from "spraynet";
 *
 * const transport = await WebSocketTransport.connect("ws://localhost:3000");
 * const out = new PacketBroadcaster(transport);
 * const router = new PacketRouter();
 *
 * router.on(PacketKind.EntityKill, (packet) => {
 *   const { netId } = EntityKill.decode(packet);
 * });
 * transport.onMessage((packet) => router.dispatch(packet));
 * ```
 */

export * from "./types";
export * from "./broadcaster";
export * from "./packet-router";
export * from "./adapters/ws-websocket";
export * from "./adapters/loopback";
