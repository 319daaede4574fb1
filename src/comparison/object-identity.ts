import type { ObjectInfo } from "../types";

export const CUSTOM_OBJECT_PREFIX = "2-";
const CUSTOM_KEY_PREFIX = "custom_";

/**
 * Custom object type ids are portal-scoped ("2-1234567"), standard ones
 * ("0-1", "0-2", ...) are the same in every portal.
 */
export function isCustomObjectType(objectType: string): boolean {
  return objectType.startsWith(CUSTOM_OBJECT_PREFIX);
}

/**
 * Build a custom object id -> "custom_<name>" map from both portals' objects.
 * Later entries overwrite earlier ones.
 */
export function buildObjectMapping(
  objectsA: ObjectInfo[],
  objectsB: ObjectInfo[],
): Map<string, string> {
  const mapping = new Map<string, string>();

  for (const object of [...objectsA, ...objectsB]) {
    if (object.objectTypeId && isCustomObjectType(object.objectTypeId)) {
      mapping.set(object.objectTypeId, `${CUSTOM_KEY_PREFIX}${object.name}`);
    }
  }

  return mapping;
}

/**
 * Map an object type id to a key that is stable across portals.
 * Unmapped custom objects fall back to their raw id.
 */
export function normalizeObjectType(
  objectType: string,
  idToName: ReadonlyMap<string, string>,
): string {
  if (!isCustomObjectType(objectType)) {
    return objectType;
  }

  return idToName.get(objectType) ?? `${CUSTOM_KEY_PREFIX}${objectType}`;
}

export function displayObjectType(
  objectType: string,
  idToName: ReadonlyMap<string, string>,
): string {
  const mapped = idToName.get(objectType);
  if (!mapped) {
    return objectType;
  }

  return mapped.startsWith(CUSTOM_KEY_PREFIX)
    ? mapped.slice(CUSTOM_KEY_PREFIX.length)
    : mapped;
}
