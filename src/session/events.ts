import type { NetworkIdentity } from "../core/binary-codec/binary-codec";
import type { MembershipEvents } from "../net/types";
import type { EntityKind } from "../replication/entity-kind";

/**
 * Events emitted by a {@link SyncSession}.
 */
export interface SyncEvents extends MembershipEvents {
	/** A participant's asset finished transferring and was decoded */
	assetAssigned: { owner: NetworkIdentity; size: number };
	/** A chunk arrived from `sender` without its begin packet */
	transferLost: { sender: NetworkIdentity };
	/** A transfer from `sender` stalled past the deadline and was dropped */
	transferExpired: { sender: NetworkIdentity };
	/** The local upload failed */
	uploadFailed: { identity: NetworkIdentity; error: unknown };
	entitySpawned: { netId: number; kind: EntityKind; owner: NetworkIdentity };
	entityKilled: { netId: number; kind: EntityKind };
	ownershipChanged: { netId: number; previousOwner: NetworkIdentity; owner: NetworkIdentity };
}
