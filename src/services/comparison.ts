import {
  compareAssociations,
  compareProperties,
  comparePropertyPairExcludeGroup,
} from "../comparison";
import { isCustomObjectType } from "../comparison/object-identity";
import { PropertyNotFoundError } from "../errors";
import type {
  AssociationComparisonResult,
  AvailableObjects,
  ComparisonResult,
  CustomObjectMatching,
  HubSpotProperty,
  ObjectInfo,
  PropertyComparison,
} from "../types";
import logger from "../utils/logger";
import type { PortalPair, SessionCacheStatus } from "./schema-cache";
import type { Session } from "./session-store";

export interface ComparisonServiceOptions {
  // Standard object types whose association definitions are compared
  associationObjectTypes: readonly string[];
}

/**
 * Fetches both portals of a session (through the session cache) and runs
 * the comparers on the results.
 */
export class ComparisonService {
  constructor(
    private session: Session,
    private options: ComparisonServiceOptions,
  ) {}

  async getObjects(): Promise<PortalPair<AvailableObjects>> {
    const { portalA, portalB } = this.session;
    return this.session.cache.getObjects(async () => {
      logger.info("Fetching available objects", { sessionId: this.session.id });
      const [objectsA, objectsB] = await Promise.all([
        portalA.source.getAvailableObjects(),
        portalB.source.getAvailableObjects(),
      ]);
      logger.info("Custom objects found", {
        portalA: objectsA.custom.length,
        portalB: objectsB.custom.length,
      });
      return { portal_a: objectsA, portal_b: objectsB };
    });
  }

  async getProperties(objectType: string): Promise<PortalPair<HubSpotProperty[]>> {
    const { portalA, portalB } = this.session;
    return this.session.cache.getProperties(objectType, async () => {
      logger.info(`Fetching properties for ${objectType}`, {
        sessionId: this.session.id,
      });
      const [propertiesA, propertiesB] = await Promise.all([
        portalA.source.getProperties(objectType),
        portalB.source.getProperties(objectType),
      ]);
      return { portal_a: propertiesA, portal_b: propertiesB };
    });
  }

  async customObjectMatching(): Promise<CustomObjectMatching> {
    const objects = await this.getObjects();
    const portalA = objects.portal_a.custom;
    const portalB = objects.portal_b.custom;

    const idsInA = new Set(portalA.map((object) => object.objectTypeId));
    return {
      portal_a: portalA,
      portal_b: portalB,
      portal_b_only: portalB.filter((object) => !idsInA.has(object.objectTypeId)),
    };
  }

  async compareObjectProperties(objectType: string): Promise<ComparisonResult> {
    const properties = await this.getProperties(objectType);
    const result = compareProperties(properties.portal_a, properties.portal_b);
    result.object_type = objectType;

    logger.info(`Compared ${objectType} properties`, summarize(result));
    return result;
  }

  /**
   * Compare two custom objects that are the same logical object but have
   * different type ids in each portal.
   */
  async compareCustomObjects(
    portalAObjectId: string,
    portalBObjectId: string,
  ): Promise<ComparisonResult> {
    const { portalA, portalB } = this.session;
    const [propertiesA, propertiesB] = await Promise.all([
      portalA.source.getProperties(portalAObjectId),
      portalB.source.getProperties(portalBObjectId),
    ]);

    const result = compareProperties(propertiesA, propertiesB);
    result.object_type = `Custom Object (${portalAObjectId} vs ${portalBObjectId})`;

    logger.info("Compared custom object properties", summarize(result));
    return result;
  }

  /**
   * Compare one property of portal A with one property of portal B, possibly
   * on different object types and under different names.
   */
  async comparePropertyPair(
    objectTypeA: string,
    propertyNameA: string,
    objectTypeB: string,
    propertyNameB: string,
  ): Promise<PropertyComparison> {
    const { portalA, portalB } = this.session;
    const [propertiesA, propertiesB] = await Promise.all([
      portalA.source.getProperties(objectTypeA),
      portalB.source.getProperties(objectTypeB),
    ]);

    const propA = findLast(propertiesA, propertyNameA);
    const propB = findLast(propertiesB, propertyNameB);

    if (propA && propB) {
      return comparePropertyPairExcludeGroup(propA, propB);
    }
    if (!propA && !propB) {
      throw new PropertyNotFoundError([propertyNameA, propertyNameB]);
    }

    return {
      property_name: `${propertyNameA} vs ${propertyNameB}`,
      status: propA ? "only_in_a" : "only_in_b",
      property_a: propA ?? null,
      property_b: propB ?? null,
      differences: [],
    };
  }

  async compareAssociations(): Promise<AssociationComparisonResult> {
    const { portalA, portalB } = this.session;
    const standardTypes = this.options.associationObjectTypes;

    const snapshot = await this.session.cache.getAssociations(async () => {
      const [customA, customB] = await Promise.all([
        portalA.source.getCustomObjects(),
        portalB.source.getCustomObjects(),
      ]);
      const [associationsA, associationsB] = await Promise.all([
        portalA.source.getAssociations([...standardTypes, ...customTypeIds(customA)]),
        portalB.source.getAssociations([...standardTypes, ...customTypeIds(customB)]),
      ]);
      return {
        associations: { portal_a: associationsA, portal_b: associationsB },
        customObjects: { portal_a: customA, portal_b: customB },
      };
    });

    const result = compareAssociations(
      snapshot.associations.portal_a,
      snapshot.associations.portal_b,
      snapshot.customObjects.portal_a,
      snapshot.customObjects.portal_b,
    );

    logger.info("Compared associations", {
      total_a: result.total_associations_a,
      total_b: result.total_associations_b,
      identical: result.identical_count,
      different: result.different_count,
    });
    return result;
  }

  refreshCache(objectType?: string): void {
    this.session.cache.clear(objectType);
    logger.info(
      objectType ? `Cleared cache for ${objectType}` : "Cleared all cache",
      { sessionId: this.session.id },
    );
  }

  cacheStatus(): SessionCacheStatus {
    return this.session.cache.status();
  }
}

// Same resolution as the comparers: the last duplicate wins
function findLast(
  properties: HubSpotProperty[],
  name: string,
): HubSpotProperty | undefined {
  let found: HubSpotProperty | undefined;
  for (const property of properties) {
    if (property.name === name) {
      found = property;
    }
  }
  return found;
}

function customTypeIds(objects: ObjectInfo[]): string[] {
  return objects
    .map((object) => object.objectTypeId)
    .filter((id): id is string => id !== undefined && isCustomObjectType(id));
}

function summarize(result: ComparisonResult) {
  return {
    objectType: result.object_type,
    identical: result.identical_count,
    different: result.different_count,
    onlyInA: result.only_in_a_count,
    onlyInB: result.only_in_b_count,
  };
}
