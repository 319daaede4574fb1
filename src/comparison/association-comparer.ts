import type {
  AssociationComparison,
  AssociationComparisonResult,
  AssociationConfiguration,
  ComparisonStatus,
  ObjectInfo,
  PropertyDiff,
} from "../types";
import { emptyCounters, indexBy, sortedUnion, tally } from "./diff";
import {
  buildObjectMapping,
  displayObjectType,
  normalizeObjectType,
} from "./object-identity";

/**
 * Key used to pair associations across portals. Type ids are portal-assigned,
 * so labelled associations match on label + endpoints and unlabeled ones on
 * endpoints + category.
 */
export function associationKey(
  association: AssociationConfiguration,
  idToName: ReadonlyMap<string, string>,
): string {
  const from = normalizeObjectType(association.fromObjectType, idToName);
  const to = normalizeObjectType(association.toObjectType, idToName);

  if (association.label) {
    return `${association.label}_${from}_to_${to}`;
  }
  return `unlabeled_${from}_to_${to}_${association.category}`;
}

export function formatAssociationDisplayName(
  association: AssociationConfiguration,
  idToName: ReadonlyMap<string, string>,
): string {
  const from = displayObjectType(association.fromObjectType, idToName);
  const to = displayObjectType(association.toObjectType, idToName);
  return `${association.label || "Unlabeled"} (${from} → ${to})`;
}

/**
 * Compare association definitions across two portals. Pass both portals'
 * custom objects to match custom endpoints by object name instead of id.
 */
export function compareAssociations(
  associationsA: AssociationConfiguration[],
  associationsB: AssociationConfiguration[],
  objectsA?: ObjectInfo[],
  objectsB?: ObjectInfo[],
): AssociationComparisonResult {
  const idToName =
    objectsA || objectsB
      ? buildObjectMapping(objectsA ?? [], objectsB ?? [])
      : new Map<string, string>();

  const byKeyA = indexBy(associationsA, (a) => associationKey(a, idToName));
  const byKeyB = indexBy(associationsB, (a) => associationKey(a, idToName));

  const counters = emptyCounters();
  const comparisons: AssociationComparison[] = [];

  for (const key of sortedUnion(byKeyA, byKeyB)) {
    const associationA = byKeyA.get(key);
    const associationB = byKeyB.get(key);

    let comparison: AssociationComparison;
    if (associationA && associationB) {
      const differences = diffAssociations(associationA, associationB, idToName);
      const status: ComparisonStatus =
        differences.length === 0 ? "identical" : "different";
      comparison = {
        association_key: key,
        display_name: formatAssociationDisplayName(associationA, idToName),
        status,
        association_a: associationA,
        association_b: associationB,
        differences,
      };
    } else if (associationA) {
      comparison = {
        association_key: key,
        display_name: formatAssociationDisplayName(associationA, idToName),
        status: "only_in_a",
        association_a: associationA,
        association_b: null,
        differences: [],
      };
    } else if (associationB) {
      comparison = {
        association_key: key,
        display_name: formatAssociationDisplayName(associationB, idToName),
        status: "only_in_b",
        association_a: null,
        association_b: associationB,
        differences: [],
      };
    } else {
      continue;
    }

    tally(counters, comparison.status);
    comparisons.push(comparison);
  }

  return {
    object_type: "associations",
    total_associations_a: associationsA.length,
    total_associations_b: associationsB.length,
    identical_count: counters.identical,
    different_count: counters.different,
    only_in_a_count: counters.only_in_a,
    only_in_b_count: counters.only_in_b,
    comparisons,
  };
}

function diffAssociations(
  associationA: AssociationConfiguration,
  associationB: AssociationConfiguration,
  idToName: ReadonlyMap<string, string>,
): PropertyDiff[] {
  const differences: PropertyDiff[] = [];

  if (associationA.category !== associationB.category) {
    differences.push({
      field_name: "Category",
      portal_a_value: associationA.category,
      portal_b_value: associationB.category,
      status: "different",
    });
  }

  // Equality on normalized ids, display of the raw ones
  const endpoints = [
    { label: "From Object Type", read: (a: AssociationConfiguration) => a.fromObjectType },
    { label: "To Object Type", read: (a: AssociationConfiguration) => a.toObjectType },
  ];
  for (const endpoint of endpoints) {
    const rawA = endpoint.read(associationA);
    const rawB = endpoint.read(associationB);
    if (normalizeObjectType(rawA, idToName) !== normalizeObjectType(rawB, idToName)) {
      differences.push({
        field_name: endpoint.label,
        portal_a_value: rawA,
        portal_b_value: rawB,
        status: "different",
      });
    }
  }

  return differences;
}
