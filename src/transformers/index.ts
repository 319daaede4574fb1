import { z } from "zod";
import type {
  AssociationConfiguration,
  FieldType,
  HubSpotProperty,
  ObjectInfo,
  PropertyOption,
  PropertyType,
  PropertyValidationRule,
} from "../types";
import { CUSTOM_OBJECT_PREFIX } from "../comparison/object-identity";
import logger from "../utils/logger";

const PROPERTY_TYPES: readonly PropertyType[] = [
  "string",
  "number",
  "date",
  "datetime",
  "enumeration",
  "bool",
  "phone_number",
  "json",
];

const FIELD_TYPES: readonly FieldType[] = [
  "text",
  "textarea",
  "number",
  "date",
  "datetime",
  "select",
  "radio",
  "checkbox",
  "booleancheckbox",
  "file",
];

// HubSpot sends null for unset values as often as it omits them
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);
const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);
const optionalBoolean = z
  .boolean()
  .nullish()
  .transform((value) => value ?? undefined);
const flag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

const rawOptionSchema = z.object({
  label: z.string().nullish(),
  value: z.string().nullish(),
  description: optionalString,
  hidden: flag,
  displayOrder: optionalNumber,
});

const rawPropertySchema = z.object({
  name: z.string().min(1),
  label: optionalString,
  description: optionalString,
  groupName: optionalString,
  type: z.string().nullish(),
  fieldType: z.string().nullish(),
  options: z.array(rawOptionSchema).nullish(),
  required: flag,
  searchableInGlobalSearch: flag,
  hasUniqueValue: flag,
  hidden: flag,
  displayOrder: optionalNumber,
  calculated: flag,
  externalOptions: flag,
  hubspotDefined: flag,
  showCurrencySymbol: optionalBoolean,
  createdAt: optionalString,
  updatedAt: optionalString,
  archived: flag,
});

export const propertyPageSchema = z.object({
  results: z.array(z.unknown()).optional(),
  paging: z
    .object({
      next: z.object({ after: z.string().optional() }).optional(),
    })
    .optional(),
});

const rawValidationRuleSchema = z.object({
  ruleType: z.string().min(1),
  ruleArguments: z
    .array(z.union([z.string(), z.number()]))
    .nullish()
    .transform((args) => (args ?? []).map(String)),
});

export const validationsResponseSchema = z.object({
  results: z
    .array(
      z.object({
        propertyName: z.string().nullish(),
        propertyValidationRules: z.array(z.unknown()).nullish(),
      }),
    )
    .optional(),
});

const rawObjectSchema = z.object({
  name: z.string().min(1),
  objectTypeId: z.string().nullish(),
  fullyQualifiedName: z.string().nullish(),
  labels: z.record(z.string().nullish()).nullish(),
  requiredProperties: z.array(z.string()).nullish(),
  searchableProperties: z.array(z.string()).nullish(),
  primaryDisplayProperty: optionalString,
});

const rawAssociationDefinitionSchema = z.object({
  category: z.string().min(1),
  typeId: z.number(),
  label: optionalString,
});

export function mapPropertyType(value: string | null | undefined): PropertyType {
  const normalized = (value ?? "string").toLowerCase();
  return PROPERTY_TYPES.find((type) => type === normalized) ?? "string";
}

export function mapFieldType(value: string | null | undefined): FieldType {
  const normalized = (value ?? "text").toLowerCase();
  return FIELD_TYPES.find((type) => type === normalized) ?? "text";
}

/**
 * Parse one record of the properties endpoint. Records without a name are
 * skipped.
 */
export function transformProperty(raw: unknown): HubSpotProperty | null {
  const parsed = rawPropertySchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Failed to parse property", {
      name: nameOf(raw),
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    return null;
  }

  const prop = parsed.data;
  const options: PropertyOption[] = (prop.options ?? []).map((option) => ({
    label: option.label ?? "",
    value: option.value ?? "",
    description: option.description,
    hidden: option.hidden,
    displayOrder: option.displayOrder,
  }));

  return {
    name: prop.name,
    label: prop.label ?? prop.name,
    description: prop.description,
    groupName: prop.groupName,
    type: mapPropertyType(prop.type),
    fieldType: mapFieldType(prop.fieldType),
    options,
    required: prop.required,
    searchableInGlobalSearch: prop.searchableInGlobalSearch,
    hasUniqueValue: prop.hasUniqueValue,
    hidden: prop.hidden,
    displayOrder: prop.displayOrder,
    calculated: prop.calculated,
    externalOptions: prop.externalOptions,
    hubspotDefined: prop.hubspotDefined,
    showCurrencySymbol: prop.showCurrencySymbol,
    createdAt: prop.createdAt,
    updatedAt: prop.updatedAt,
    archived: prop.archived,
    validationRules: [],
  };
}

/**
 * Parse a rule from the property-validations endpoint, which only reports a
 * rule type and positional arguments.
 */
export function transformValidationRule(raw: unknown): PropertyValidationRule | null {
  const parsed = rawValidationRuleSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Failed to parse validation rule", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    return null;
  }

  const { ruleType, ruleArguments } = parsed.data;
  const [firstArgument] = ruleArguments;

  // Returned rules are active and block saves
  const rule: PropertyValidationRule = {
    name: ruleType,
    enabled: true,
    blocker: true,
  };

  switch (ruleType) {
    case "MIN_NUMBER":
      rule.min = parseDecimal(firstArgument);
      break;
    case "MAX_NUMBER":
      rule.max = parseDecimal(firstArgument);
      break;
    case "MIN_LENGTH":
      rule.minLength = parseInteger(firstArgument);
      break;
    case "MAX_LENGTH":
      rule.maxLength = parseInteger(firstArgument);
      break;
    case "REGEX":
      rule.pattern = firstArgument;
      break;
    case "ALPHANUMERIC":
      if (ruleArguments.includes("NUMERIC_ONLY")) {
        rule.name = "NUMERIC_ONLY";
        rule.pattern = "^\\d+$";
      }
      break;
  }

  return rule;
}

/**
 * Group the property-validations response by property name.
 */
export function transformValidations(
  raw: unknown,
): Map<string, PropertyValidationRule[]> {
  const byProperty = new Map<string, PropertyValidationRule[]>();
  const parsed = validationsResponseSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Unexpected property validations payload", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    return byProperty;
  }

  for (const entry of parsed.data.results ?? []) {
    if (!entry.propertyName) {
      continue;
    }
    const rules = (entry.propertyValidationRules ?? [])
      .map(transformValidationRule)
      .filter((rule): rule is PropertyValidationRule => rule !== null);
    if (rules.length > 0) {
      byProperty.set(entry.propertyName, rules);
    }
  }

  return byProperty;
}

/**
 * Custom object schemas have a "2-" type id and a portal-qualified name
 * ("p1234_cars").
 */
export function isCustomObjectSchema(raw: unknown): boolean {
  const parsed = rawObjectSchema.safeParse(raw);
  if (!parsed.success) {
    return false;
  }
  const objectTypeId = parsed.data.objectTypeId ?? "";
  const fullyQualifiedName = parsed.data.fullyQualifiedName ?? "";
  return objectTypeId.startsWith(CUSTOM_OBJECT_PREFIX) && fullyQualifiedName.startsWith("p");
}

export function transformObjectSchema(raw: unknown): ObjectInfo | null {
  const parsed = rawObjectSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Failed to parse object schema", { name: nameOf(raw) });
    return null;
  }

  const schema = parsed.data;
  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(schema.labels ?? {})) {
    if (typeof value === "string") {
      labels[key] = value;
    }
  }

  return {
    name: schema.name,
    objectTypeId: schema.objectTypeId ?? undefined,
    labels,
    requiredProperties: schema.requiredProperties ?? [],
    searchableProperties: schema.searchableProperties ?? [],
    primaryDisplayProperty: schema.primaryDisplayProperty,
  };
}

export function standardObject(name: string): ObjectInfo {
  return {
    name,
    labels: {},
    requiredProperties: [],
    searchableProperties: [],
  };
}

export function transformAssociationDefinition(
  raw: unknown,
  fromObjectType: string,
  toObjectType: string,
): AssociationConfiguration | null {
  const parsed = rawAssociationDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Failed to parse association definition", {
      fromObjectType,
      toObjectType,
    });
    return null;
  }

  return {
    label: parsed.data.label || undefined,
    fromObjectType,
    toObjectType,
    category: parsed.data.category,
    typeId: parsed.data.typeId,
  };
}

function parseDecimal(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  const parsed = parseDecimal(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
}

function nameOf(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "name" in raw && typeof raw.name === "string") {
    return raw.name;
  }
  return "unknown";
}

