import { getRandomValues } from "node:crypto";
import type { NetworkIdentity } from "../binary-codec/binary-codec";

/**
 * @description
 * Generates a random non-zero 32-bit entity instance id.
 *
 * Every peer mints ids for the entities it spawns.
 *
 * @example
 * generateNetId(); // 2876143925
 */
export function generateNetId(): number {
  const [value] = getRandomValues(new Uint32Array(1));
  return value === 0 ? 1 : value;
}

/**
 * @description
 * Generates a random non-zero 64-bit network identity.
 * Real sessions get identities from the platform; this is for local
 * sessions, demos and tests.
 *
 * @example
 * generateIdentity(); // 13083467112409887213n
 */
export function generateIdentity(): NetworkIdentity {
  const [value] = getRandomValues(new BigUint64Array(1));
  return value === 0n ? 1n : value;
}

/**
 * @description
 * Formats an identity as a fixed-width hex string for logs.
 *
 * @example
 * formatIdentity(255n); // "00000000000000ff"
 */
export function formatIdentity(identity: NetworkIdentity): string {
  return identity.toString(16).padStart(16, "0");
}
