export {
  compareProperties,
  comparePropertiesExcludeGroup,
  comparePropertyPairExcludeGroup,
  formatValidationRule,
} from "./property-comparer";
export {
  associationKey,
  compareAssociations,
  formatAssociationDisplayName,
} from "./association-comparer";
export {
  buildObjectMapping,
  displayObjectType,
  isCustomObjectType,
  normalizeObjectType,
} from "./object-identity";
