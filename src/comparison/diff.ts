import type { ComparisonStatus, DiffValue, PropertyDiff } from "../types";

/**
 * One row of a field comparison table: how to read the value and how to
 * label it in the diff output.
 */
export interface FieldSpec<T> {
  label: string;
  read: (item: T) => DiffValue | undefined;
}

export interface StatusCounters {
  identical: number;
  different: number;
  only_in_a: number;
  only_in_b: number;
}

export function emptyCounters(): StatusCounters {
  return { identical: 0, different: 0, only_in_a: 0, only_in_b: 0 };
}

export function tally(counters: StatusCounters, status: ComparisonStatus): void {
  if (status !== "modified") {
    counters[status] += 1;
  }
}

export function toDiffValue(value: DiffValue | undefined): DiffValue {
  return value === undefined ? null : value;
}

// Lists compare by value, everything else strictly
export function valuesEqual(a: DiffValue, b: DiffValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => item === b[index]);
  }
  return a === b;
}

export function diffFields<T>(
  fields: ReadonlyArray<FieldSpec<T>>,
  itemA: T,
  itemB: T,
  fieldName: (label: string) => string = (label) => label,
): PropertyDiff[] {
  const differences: PropertyDiff[] = [];

  for (const field of fields) {
    const valueA = toDiffValue(field.read(itemA));
    const valueB = toDiffValue(field.read(itemB));

    if (!valuesEqual(valueA, valueB)) {
      differences.push({
        field_name: fieldName(field.label),
        portal_a_value: valueA,
        portal_b_value: valueB,
        status: "different",
      });
    }
  }

  return differences;
}

/**
 * Index items by identity key. Duplicate keys resolve to the last item.
 */
export function indexBy<T>(items: T[], key: (item: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    index.set(key(item), item);
  }
  return index;
}

export function sortedUnion(
  a: ReadonlyMap<string, unknown>,
  b: ReadonlyMap<string, unknown>,
): string[] {
  return Array.from(new Set([...a.keys(), ...b.keys()])).sort();
}
