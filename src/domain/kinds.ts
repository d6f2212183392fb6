/**
 * Kind enumerations.
 *
 * A kind enumeration is a closed set of condition kinds, declared as a
 * TypeScript `enum` or an `as const` object literal. The enumeration object
 * itself is the registry key, so two enumerations with identical members are
 * still distinct registries.
 */

export type KindEnum = Readonly<Record<string, string | number>>;

/** A member of a kind enumeration (numeric reverse mappings excluded). */
export type KindOf<E extends KindEnum> = E[Extract<keyof E, string>];

// Numeric enums carry a reverse mapping ("0" -> "HasId"); member names are never numeric.
function isReverseMappingKey(key: string): boolean {
  return key.trim() !== '' && !Number.isNaN(Number(key));
}

/**
 * Members of the enumeration in declaration order.
 */
export function enumMembers<E extends KindEnum>(kinds: E): KindOf<E>[] {
  const members: KindOf<E>[] = [];
  for (const key in kinds) {
    if (isReverseMappingKey(key)) continue;
    members.push(kinds[key]);
  }
  return members;
}

export function isMember<E extends KindEnum>(kinds: E, candidate: unknown): candidate is KindOf<E> {
  return enumMembers(kinds).some((member) => member === candidate);
}

/**
 * Declared name of a member, used in messages ("No HasId conditions passed").
 * Falls back to the member's value when the enumeration does not declare it.
 */
export function kindName<E extends KindEnum>(kinds: E, kind: KindOf<E>): string {
  for (const key in kinds) {
    if (!isReverseMappingKey(key) && kinds[key] === kind) return key;
  }
  return String(kind);
}
