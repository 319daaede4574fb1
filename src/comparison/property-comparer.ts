import type {
  ComparisonResult,
  ComparisonStatus,
  HubSpotProperty,
  PropertyComparison,
  PropertyDiff,
  PropertyOption,
  PropertyValidationRule,
} from "../types";
import {
  type FieldSpec,
  diffFields,
  emptyCounters,
  indexBy,
  sortedUnion,
  tally,
} from "./diff";

export const PROPERTY_FIELDS: ReadonlyArray<FieldSpec<HubSpotProperty>> = [
  { label: "Label", read: (p) => p.label },
  { label: "Description", read: (p) => p.description },
  { label: "Group Name", read: (p) => p.groupName },
  { label: "Type", read: (p) => p.type },
  { label: "Field Type", read: (p) => p.fieldType },
  { label: "Required", read: (p) => p.required },
  { label: "Searchable in Global Search", read: (p) => p.searchableInGlobalSearch },
  { label: "Has Unique Value", read: (p) => p.hasUniqueValue },
  { label: "Hidden", read: (p) => p.hidden },
  { label: "Display Order", read: (p) => p.displayOrder },
  { label: "Calculated", read: (p) => p.calculated },
  { label: "External Options", read: (p) => p.externalOptions },
  { label: "HubSpot Defined", read: (p) => p.hubspotDefined },
  { label: "Show Currency Symbol", read: (p) => p.showCurrencySymbol },
];

// Properties of different objects may live in different groups
export const PROPERTY_FIELDS_EXCLUDING_GROUP = PROPERTY_FIELDS.filter(
  (field) => field.label !== "Group Name",
);

export const OPTION_FIELDS: ReadonlyArray<FieldSpec<PropertyOption>> = [
  { label: "Label", read: (o) => o.label },
  // Missing and empty descriptions are the same thing for options
  { label: "Description", read: (o) => o.description ?? "" },
  { label: "Hidden", read: (o) => o.hidden },
  { label: "Display Order", read: (o) => o.displayOrder },
];

export const VALIDATION_RULE_FIELDS: ReadonlyArray<FieldSpec<PropertyValidationRule>> = [
  { label: "Enabled", read: (r) => r.enabled },
  { label: "Blocker", read: (r) => r.blocker },
  { label: "Message", read: (r) => r.message },
  { label: "Min Length", read: (r) => r.minLength },
  { label: "Max Length", read: (r) => r.maxLength },
  { label: "Min Value", read: (r) => r.min },
  { label: "Max Value", read: (r) => r.max },
  { label: "Regex Pattern", read: (r) => r.pattern },
  { label: "Use Default Block List", read: (r) => r.useDefaultBlockList },
  { label: "Domain Block List", read: (r) => r.domainBlockList },
];

interface PairOptions {
  fields: ReadonlyArray<FieldSpec<HubSpotProperty>>;
  pairKey: (propA: HubSpotProperty, propB: HubSpotProperty) => string;
}

const STANDARD_PAIR: PairOptions = {
  fields: PROPERTY_FIELDS,
  pairKey: (propA) => propA.name,
};

const CROSS_OBJECT_PAIR: PairOptions = {
  fields: PROPERTY_FIELDS_EXCLUDING_GROUP,
  pairKey: (propA, propB) => `${propA.name} vs ${propB.name}`,
};

/**
 * Compare the properties of one object type across two portals.
 * Properties are paired by name and reported in name order.
 */
export function compareProperties(
  propertiesA: HubSpotProperty[],
  propertiesB: HubSpotProperty[],
): ComparisonResult {
  return compareWith(propertiesA, propertiesB, STANDARD_PAIR);
}

/**
 * Same as compareProperties, without comparing group names.
 */
export function comparePropertiesExcludeGroup(
  propertiesA: HubSpotProperty[],
  propertiesB: HubSpotProperty[],
): ComparisonResult {
  return compareWith(propertiesA, propertiesB, CROSS_OBJECT_PAIR);
}

/**
 * Compare two explicitly chosen properties, which may have different names
 * and belong to different object types.
 */
export function comparePropertyPairExcludeGroup(
  propA: HubSpotProperty,
  propB: HubSpotProperty,
): PropertyComparison {
  return comparePair(propA, propB, CROSS_OBJECT_PAIR);
}

function compareWith(
  propertiesA: HubSpotProperty[],
  propertiesB: HubSpotProperty[],
  options: PairOptions,
): ComparisonResult {
  const byNameA = indexBy(propertiesA, (p) => p.name);
  const byNameB = indexBy(propertiesB, (p) => p.name);

  const counters = emptyCounters();
  const comparisons: PropertyComparison[] = [];

  for (const name of sortedUnion(byNameA, byNameB)) {
    const propA = byNameA.get(name);
    const propB = byNameB.get(name);

    let comparison: PropertyComparison;
    if (propA && propB) {
      comparison = comparePair(propA, propB, options);
    } else {
      comparison = {
        property_name: name,
        status: propA ? "only_in_a" : "only_in_b",
        property_a: propA ?? null,
        property_b: propB ?? null,
        differences: [],
      };
    }

    tally(counters, comparison.status);
    comparisons.push(comparison);
  }

  return {
    // Stamped by the caller
    object_type: "unknown",
    total_properties_a: propertiesA.length,
    total_properties_b: propertiesB.length,
    identical_count: counters.identical,
    different_count: counters.different,
    only_in_a_count: counters.only_in_a,
    only_in_b_count: counters.only_in_b,
    comparisons,
  };
}

function comparePair(
  propA: HubSpotProperty,
  propB: HubSpotProperty,
  options: PairOptions,
): PropertyComparison {
  const differences = diffFields(options.fields, propA, propB);

  if (propA.options.length > 0 || propB.options.length > 0) {
    differences.push(...compareOptions(propA.options, propB.options));
  }

  if (propA.validationRules.length > 0 || propB.validationRules.length > 0) {
    differences.push(
      ...compareValidationRules(propA.validationRules, propB.validationRules),
    );
  }

  const status: ComparisonStatus =
    differences.length === 0 ? "identical" : "different";

  return {
    property_name: options.pairKey(propA, propB),
    status,
    property_a: propA,
    property_b: propB,
    differences,
  };
}

export function compareOptions(
  optionsA: PropertyOption[],
  optionsB: PropertyOption[],
): PropertyDiff[] {
  const byValueA = indexBy(optionsA, (o) => o.value);
  const byValueB = indexBy(optionsB, (o) => o.value);
  const differences: PropertyDiff[] = [];

  for (const value of sortedUnion(byValueA, byValueB)) {
    const optionA = byValueA.get(value);
    const optionB = byValueB.get(value);

    if (optionA && optionB) {
      differences.push(
        ...diffFields(
          OPTION_FIELDS,
          optionA,
          optionB,
          (label) => `Option '${value}' ${label}`,
        ),
      );
    } else if (optionA) {
      differences.push({
        field_name: `Option '${value}'`,
        portal_a_value: formatOption(optionA),
        portal_b_value: null,
        status: "only_in_a",
      });
    } else if (optionB) {
      differences.push({
        field_name: `Option '${value}'`,
        portal_a_value: null,
        portal_b_value: formatOption(optionB),
        status: "only_in_b",
      });
    }
  }

  return differences;
}

export function compareValidationRules(
  rulesA: PropertyValidationRule[],
  rulesB: PropertyValidationRule[],
): PropertyDiff[] {
  const byNameA = indexBy(rulesA, (r) => r.name);
  const byNameB = indexBy(rulesB, (r) => r.name);
  const differences: PropertyDiff[] = [];

  for (const name of sortedUnion(byNameA, byNameB)) {
    const ruleA = byNameA.get(name);
    const ruleB = byNameB.get(name);

    if (ruleA && ruleB) {
      differences.push(
        ...diffFields(
          VALIDATION_RULE_FIELDS,
          ruleA,
          ruleB,
          (label) => `Validation '${name}' ${label}`,
        ),
      );
    } else if (ruleA) {
      differences.push({
        field_name: `Validation Rule '${name}'`,
        portal_a_value: formatValidationRule(ruleA),
        portal_b_value: null,
        status: "only_in_a",
      });
    } else if (ruleB) {
      differences.push({
        field_name: `Validation Rule '${name}'`,
        portal_a_value: null,
        portal_b_value: formatValidationRule(ruleB),
        status: "only_in_b",
      });
    }
  }

  return differences;
}

function formatOption(option: PropertyOption): string {
  return `${option.label} (${option.value})`;
}

export function formatValidationRule(rule: PropertyValidationRule): string {
  const parts: string[] = [];

  if (rule.minLength !== undefined) parts.push(`Min: ${rule.minLength}`);
  if (rule.maxLength !== undefined) parts.push(`Max: ${rule.maxLength}`);
  if (rule.pattern) parts.push(`Pattern: ${rule.pattern}`);
  if (rule.min !== undefined) parts.push(`Min: ${rule.min}`);
  if (rule.max !== undefined) parts.push(`Max: ${rule.max}`);
  if (!rule.enabled) parts.push("Disabled");
  if (rule.blocker) parts.push("Blocker");

  return parts.length > 0 ? parts.join(", ") : "Rule exists";
}
