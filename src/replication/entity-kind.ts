/**
 * Replicated entity kinds.
 *
 * - `projectile`: transform only, simply removed when killed
 * - `rocket`: transform plus the armed flags (a passenger riding it, frozen
 *   by its owner); detonates harmlessly when killed
 * - `cannonball`: transform only; shatters when killed
 */
export type EntityKind = "projectile" | "rocket" | "cannonball";

/** Visual effect run by the physics collaborator when an entity dies. */
export type DestroyEffect = "none" | "explode" | "shatter";

/**
 * What a kind carries on the wire and how it dies.
 */
export interface EntityCapabilities {
	/** Wire code of the kind */
	code: number;
	/** Snapshot carries `riding` and `frozen` after the transform */
	armedFlags: boolean;
	destroyEffect: DestroyEffect;
}

export const ENTITY_KINDS = {
	projectile: { code: 0, armedFlags: false, destroyEffect: "none" },
	rocket: { code: 1, armedFlags: true, destroyEffect: "explode" },
	cannonball: { code: 2, armedFlags: false, destroyEffect: "shatter" },
} as const satisfies Record<EntityKind, EntityCapabilities>;

const kindsByCode = new Map<number, EntityKind>(
	(Object.keys(ENTITY_KINDS) as EntityKind[]).map((kind) => [ENTITY_KINDS[kind].code, kind])
);

export function capabilitiesOf(kind: EntityKind): EntityCapabilities {
	return ENTITY_KINDS[kind];
}

/**
 * Resolves a wire code, or `undefined` for an unknown code.
 */
export function entityKindFromCode(code: number): EntityKind | undefined {
	return kindsByCode.get(code);
}
