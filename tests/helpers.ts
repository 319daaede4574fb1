import type {
  AssociationConfiguration,
  AvailableObjects,
  HubSpotProperty,
  ObjectInfo,
  PortalSchemaSource,
  PropertyOption,
  PropertyValidationRule,
} from "../src/types";

export function makeProperty(overrides: Partial<HubSpotProperty> & { name: string }): HubSpotProperty {
  return {
    label: overrides.name,
    type: "string",
    fieldType: "text",
    options: [],
    required: false,
    searchableInGlobalSearch: false,
    hasUniqueValue: false,
    hidden: false,
    calculated: false,
    externalOptions: false,
    hubspotDefined: false,
    archived: false,
    validationRules: [],
    ...overrides,
  };
}

export function makeOption(overrides: Partial<PropertyOption> & { value: string }): PropertyOption {
  return {
    label: overrides.value,
    hidden: false,
    ...overrides,
  };
}

export function makeRule(
  overrides: Partial<PropertyValidationRule> & { name: string },
): PropertyValidationRule {
  return {
    enabled: true,
    blocker: false,
    ...overrides,
  };
}

export function makeObject(name: string, objectTypeId?: string): ObjectInfo {
  return {
    name,
    objectTypeId,
    labels: {},
    requiredProperties: [],
    searchableProperties: [],
  };
}

export function makeAssociation(
  overrides: Partial<AssociationConfiguration> = {},
): AssociationConfiguration {
  return {
    fromObjectType: "0-1",
    toObjectType: "0-2",
    category: "USER_DEFINED",
    typeId: 1,
    ...overrides,
  };
}

/**
 * In-memory portal with call counters.
 */
export class FakeSource implements PortalSchemaSource {
  calls: {
    validateToken: number;
    getAvailableObjects: number;
    getProperties: string[];
    getCustomObjects: number;
    getAssociations: string[][];
  } = {
    validateToken: 0,
    getAvailableObjects: 0,
    getProperties: [],
    getCustomObjects: 0,
    getAssociations: [],
  };

  constructor(
    public data: {
      valid?: boolean;
      properties?: Record<string, HubSpotProperty[]>;
      customObjects?: ObjectInfo[];
      associations?: AssociationConfiguration[];
      failWith?: Error;
    } = {},
  ) {}

  async validateToken(): Promise<void> {
    this.calls.validateToken++;
    if (this.data.valid === false) {
      throw new Error("HTTP 401");
    }
  }

  async getAvailableObjects(): Promise<AvailableObjects> {
    this.calls.getAvailableObjects++;
    return {
      standard: [makeObject("contacts")],
      custom: this.data.customObjects ?? [],
    };
  }

  async getProperties(objectType: string): Promise<HubSpotProperty[]> {
    this.calls.getProperties.push(objectType);
    if (this.data.failWith) {
      throw this.data.failWith;
    }
    return this.data.properties?.[objectType] ?? [];
  }

  async getCustomObjects(): Promise<ObjectInfo[]> {
    this.calls.getCustomObjects++;
    return this.data.customObjects ?? [];
  }

  async getAssociations(objectTypes: string[]): Promise<AssociationConfiguration[]> {
    this.calls.getAssociations.push(objectTypes);
    return this.data.associations ?? [];
  }
}
