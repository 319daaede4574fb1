// Common types for the schema comparison service

export type PropertyType =
  | "string"
  | "number"
  | "date"
  | "datetime"
  | "enumeration"
  | "bool"
  | "phone_number"
  | "json";

export type FieldType =
  | "text"
  | "textarea"
  | "number"
  | "date"
  | "datetime"
  | "select"
  | "radio"
  | "checkbox"
  | "booleancheckbox"
  | "file";

export interface PropertyOption {
  label: string;
  value: string;
  description?: string;
  hidden: boolean;
  displayOrder?: number;
}

export interface PropertyValidationRule {
  name: string;
  enabled: boolean;
  blocker: boolean;
  message?: string;
  // Text length
  minLength?: number;
  maxLength?: number;
  // Number range
  min?: number;
  max?: number;
  pattern?: string;
  // Email domains
  useDefaultBlockList?: boolean;
  domainBlockList?: string[];
}

export interface HubSpotProperty {
  name: string;
  label: string;
  description?: string;
  groupName?: string;
  type: PropertyType;
  fieldType: FieldType;
  options: PropertyOption[];
  required: boolean;
  searchableInGlobalSearch: boolean;
  hasUniqueValue: boolean;
  hidden: boolean;
  displayOrder?: number;
  calculated: boolean;
  externalOptions: boolean;
  hubspotDefined: boolean;
  showCurrencySymbol?: boolean;
  createdAt?: string;
  updatedAt?: string;
  archived: boolean;
  validationRules: PropertyValidationRule[];
}

export interface AssociationConfiguration {
  label?: string;
  fromObjectType: string;
  toObjectType: string;
  category: string;
  // Portal-assigned, never compared
  typeId: number;
}

export interface ObjectInfo {
  name: string;
  objectTypeId?: string;
  labels: Record<string, string>;
  requiredProperties: string[];
  searchableProperties: string[];
  primaryDisplayProperty?: string;
}

export interface AvailableObjects {
  standard: ObjectInfo[];
  custom: ObjectInfo[];
}

// Both portals' custom objects, for pairing them up by hand
export interface CustomObjectMatching {
  portal_a: ObjectInfo[];
  portal_b: ObjectInfo[];
  // Portal B objects whose type id portal A does not have
  portal_b_only: ObjectInfo[];
}

// Comparison types

export type ComparisonStatus =
  | "identical"
  | "different"
  | "only_in_a"
  | "only_in_b"
  // Reserved, not produced by the comparers
  | "modified";

export type DiffValue = string | number | boolean | string[] | null;

export interface PropertyDiff {
  field_name: string;
  portal_a_value: DiffValue;
  portal_b_value: DiffValue;
  status: ComparisonStatus;
}

export interface PropertyComparison {
  property_name: string;
  status: ComparisonStatus;
  property_a: HubSpotProperty | null;
  property_b: HubSpotProperty | null;
  differences: PropertyDiff[];
}

export interface ComparisonResult {
  object_type: string;
  total_properties_a: number;
  total_properties_b: number;
  identical_count: number;
  different_count: number;
  only_in_a_count: number;
  only_in_b_count: number;
  comparisons: PropertyComparison[];
}

export interface AssociationComparison {
  association_key: string;
  display_name: string;
  status: ComparisonStatus;
  association_a: AssociationConfiguration | null;
  association_b: AssociationConfiguration | null;
  differences: PropertyDiff[];
}

export interface AssociationComparisonResult {
  object_type: string;
  total_associations_a: number;
  total_associations_b: number;
  identical_count: number;
  different_count: number;
  only_in_a_count: number;
  only_in_b_count: number;
  comparisons: AssociationComparison[];
}

// Upstream source of one portal's schema metadata
export interface PortalSchemaSource {
  validateToken(): Promise<void>;
  getAvailableObjects(): Promise<AvailableObjects>;
  getProperties(objectType: string): Promise<HubSpotProperty[]>;
  getCustomObjects(): Promise<ObjectInfo[]>;
  getAssociations(objectTypes: string[]): Promise<AssociationConfiguration[]>;
}
