import { describe, expect, it } from "vitest";
import {
  isCustomObjectSchema,
  mapFieldType,
  mapPropertyType,
  transformAssociationDefinition,
  transformObjectSchema,
  transformProperty,
  transformValidationRule,
  transformValidations,
} from "../src/transformers";

describe("transformProperty", () => {
  it("maps a full property record", () => {
    const property = transformProperty({
      name: "lifecyclestage",
      label: "Lifecycle Stage",
      description: null,
      groupName: "contactinformation",
      type: "ENUMERATION",
      fieldType: "radio",
      options: [{ label: "Lead", value: "lead", hidden: false, displayOrder: 1 }],
      required: true,
      searchableInGlobalSearch: null,
      displayOrder: 3,
      hubspotDefined: true,
    });

    expect(property).toEqual({
      name: "lifecyclestage",
      label: "Lifecycle Stage",
      description: undefined,
      groupName: "contactinformation",
      type: "enumeration",
      fieldType: "radio",
      options: [
        { label: "Lead", value: "lead", description: undefined, hidden: false, displayOrder: 1 },
      ],
      required: true,
      searchableInGlobalSearch: false,
      hasUniqueValue: false,
      hidden: false,
      displayOrder: 3,
      calculated: false,
      externalOptions: false,
      hubspotDefined: true,
      showCurrencySymbol: undefined,
      createdAt: undefined,
      updatedAt: undefined,
      archived: false,
      validationRules: [],
    });
  });

  it("falls back to the name for a missing label", () => {
    expect(transformProperty({ name: "zip" })?.label).toBe("zip");
  });

  it("skips records without a name", () => {
    expect(transformProperty({ label: "Nameless" })).toBeNull();
    expect(transformProperty("not an object")).toBeNull();
  });

  it("fills missing option labels and values with empty strings", () => {
    const property = transformProperty({ name: "tier", options: [{ hidden: true }] });

    expect(property?.options).toEqual([
      { label: "", value: "", description: undefined, hidden: true, displayOrder: undefined },
    ]);
  });
});

describe("type mapping", () => {
  it("accepts known types in any case", () => {
    expect(mapPropertyType("DateTime")).toBe("datetime");
    expect(mapFieldType("BooleanCheckbox")).toBe("booleancheckbox");
  });

  it("falls back for unknown or missing types", () => {
    expect(mapPropertyType("object_coordinates")).toBe("string");
    expect(mapPropertyType(undefined)).toBe("string");
    expect(mapFieldType("calculation_equation")).toBe("text");
    expect(mapFieldType(null)).toBe("text");
  });
});

describe("transformValidationRule", () => {
  it("reads number bounds", () => {
    expect(transformValidationRule({ ruleType: "MIN_NUMBER", ruleArguments: ["2.5"] })).toEqual({
      name: "MIN_NUMBER",
      enabled: true,
      blocker: true,
      min: 2.5,
    });
    expect(transformValidationRule({ ruleType: "MAX_NUMBER", ruleArguments: [100] })?.max).toBe(
      100,
    );
  });

  it("reads integer lengths and drops anything else", () => {
    expect(
      transformValidationRule({ ruleType: "MIN_LENGTH", ruleArguments: ["3"] })?.minLength,
    ).toBe(3);
    expect(
      transformValidationRule({ ruleType: "MAX_LENGTH", ruleArguments: ["3.5"] })?.maxLength,
    ).toBeUndefined();
    expect(
      transformValidationRule({ ruleType: "MAX_LENGTH", ruleArguments: ["many"] })?.maxLength,
    ).toBeUndefined();
  });

  it("keeps regex patterns verbatim", () => {
    expect(
      transformValidationRule({ ruleType: "REGEX", ruleArguments: ["^[A-Z]{2}$"] })?.pattern,
    ).toBe("^[A-Z]{2}$");
  });

  it("renames numeric-only alphanumeric rules", () => {
    expect(
      transformValidationRule({ ruleType: "ALPHANUMERIC", ruleArguments: ["NUMERIC_ONLY"] }),
    ).toEqual({
      name: "NUMERIC_ONLY",
      enabled: true,
      blocker: true,
      pattern: "^\\d+$",
    });
    expect(
      transformValidationRule({ ruleType: "ALPHANUMERIC", ruleArguments: ["ALPHA_ONLY"] })?.name,
    ).toBe("ALPHANUMERIC");
  });

  it("rejects rules without a type", () => {
    expect(transformValidationRule({ ruleArguments: ["1"] })).toBeNull();
  });
});

describe("transformValidations", () => {
  it("groups rules by property and skips empty entries", () => {
    const byProperty = transformValidations({
      results: [
        {
          propertyName: "age",
          propertyValidationRules: [
            { ruleType: "MIN_NUMBER", ruleArguments: ["18"] },
            { ruleArguments: [] },
          ],
        },
        { propertyName: "notes", propertyValidationRules: [] },
        { propertyValidationRules: [{ ruleType: "REGEX", ruleArguments: ["x"] }] },
      ],
    });

    expect([...byProperty.keys()]).toEqual(["age"]);
    expect(byProperty.get("age")).toEqual([
      { name: "MIN_NUMBER", enabled: true, blocker: true, min: 18 },
    ]);
  });

  it("returns an empty map for an unexpected payload", () => {
    expect(transformValidations({ results: "nope" }).size).toBe(0);
  });
});

describe("object schemas", () => {
  const carSchema = {
    name: "cars",
    objectTypeId: "2-3456",
    fullyQualifiedName: "p1234_cars",
    labels: { singular: "Car", plural: null },
    requiredProperties: ["vin"],
    primaryDisplayProperty: "model",
  };

  it("recognises custom object schemas", () => {
    expect(isCustomObjectSchema(carSchema)).toBe(true);
    expect(isCustomObjectSchema({ ...carSchema, fullyQualifiedName: "cars" })).toBe(false);
    expect(isCustomObjectSchema({ ...carSchema, objectTypeId: "0-1" })).toBe(false);
  });

  it("maps a schema to object info", () => {
    expect(transformObjectSchema(carSchema)).toEqual({
      name: "cars",
      objectTypeId: "2-3456",
      labels: { singular: "Car" },
      requiredProperties: ["vin"],
      searchableProperties: [],
      primaryDisplayProperty: "model",
    });
  });
});

describe("transformAssociationDefinition", () => {
  it("attaches the requested endpoints", () => {
    expect(
      transformAssociationDefinition(
        { category: "HUBSPOT_DEFINED", typeId: 279, label: null },
        "0-1",
        "0-2",
      ),
    ).toEqual({
      label: undefined,
      fromObjectType: "0-1",
      toObjectType: "0-2",
      category: "HUBSPOT_DEFINED",
      typeId: 279,
    });
  });

  it("drops definitions without a type id", () => {
    expect(transformAssociationDefinition({ category: "USER_DEFINED" }, "0-1", "0-2")).toBeNull();
  });
});
