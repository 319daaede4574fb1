import { Client } from "@hubspot/api-client";
import config from "../config";
import { HubSpotFetchError, errorMessage, toFetchError } from "../errors";
import { isCustomObjectType } from "../comparison/object-identity";
import {
  isCustomObjectSchema,
  propertyPageSchema,
  standardObject,
  transformAssociationDefinition,
  transformObjectSchema,
  transformProperty,
  transformValidations,
} from "../transformers";
import type {
  AssociationConfiguration,
  AvailableObjects,
  HubSpotProperty,
  ObjectInfo,
  PortalSchemaSource,
  PropertyValidationRule,
} from "../types";
import logger from "../utils/logger";
import { RateLimiter, retry, withTimeout } from "../utils/retry";

// Standard object names and their type ids
export const OBJECT_TYPE_IDS: Readonly<Record<string, string>> = {
  contacts: "0-1",
  companies: "0-2",
  deals: "0-3",
  tickets: "0-5",
  appointments: "0-421",
  calls: "0-48",
  communications: "0-18",
  courses: "0-410",
  emails: "0-49",
  feedback_submissions: "0-19",
  invoices: "0-53",
  leads: "0-136",
  line_items: "0-8",
  listings: "0-420",
  marketing_events: "0-54",
  meetings: "0-47",
  notes: "0-46",
  orders: "0-123",
  payments: "0-101",
  postal_mail: "0-116",
  products: "0-7",
  quotes: "0-14",
  services: "0-162",
  subscriptions: "0-69",
  tasks: "0-27",
  users: "0-115",
};

// Offered for comparison in every portal
export const STANDARD_OBJECTS = [
  "contacts",
  "companies",
  "deals",
  "tickets",
  "products",
  "line_items",
  "quotes",
  "calls",
  "emails",
  "meetings",
  "notes",
  "tasks",
];

const PAGE_SIZE = 100;

export interface HubSpotExtractorOptions {
  baseUrl?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  rateLimitPerSecond?: number;
  timeoutMs?: number;
}

/**
 * Resolve an object type name ("contacts") or id ("0-1", "2-1234") to its
 * type id. Unknown names resolve to undefined.
 */
export function resolveObjectTypeId(objectType: string): string | undefined {
  if (/^\d+-\d+$/.test(objectType)) {
    return objectType;
  }
  return OBJECT_TYPE_IDS[objectType];
}

/**
 * Private app tokens look like "pat-na1-<uuid>". Only used to warn early;
 * the API call decides.
 */
export function isPrivateAppTokenFormat(token: string): boolean {
  return token.startsWith("pat-") && token.length > 20 && token.slice(4).includes("-");
}

/**
 * Reads one portal's schema metadata from the HubSpot API.
 */
export class HubSpotExtractor implements PortalSchemaSource {
  private client: Client;
  private rateLimiter: RateLimiter;
  private maxRetries: number;
  private retryDelayMs: number;
  private timeoutMs: number;

  constructor(accessToken: string, options: HubSpotExtractorOptions = {}) {
    this.client = new Client({
      accessToken,
      basePath: options.baseUrl ?? config.hubspot.baseUrl,
    });

    const perSecond = options.rateLimitPerSecond ?? config.hubspot.rateLimitPerSecond;
    this.rateLimiter = new RateLimiter(Math.max(1, Math.ceil(perSecond)), perSecond);
    this.maxRetries = options.maxRetries ?? config.hubspot.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? config.hubspot.timeoutMs;
  }

  async validateToken(): Promise<void> {
    await this.getJson("/crm/v3/properties/contacts?limit=1", "Invalid HubSpot token");
  }

  async getAvailableObjects(): Promise<AvailableObjects> {
    let custom: ObjectInfo[] = [];
    try {
      custom = await this.getCustomObjects();
    } catch (error) {
      logger.warn("Failed to fetch custom objects", { error: errorMessage(error) });
    }

    return {
      standard: STANDARD_OBJECTS.map(standardObject),
      custom,
    };
  }

  async getCustomObjects(): Promise<ObjectInfo[]> {
    const response = await this.call("Failed to fetch custom objects", () =>
      this.client.crm.schemas.coreApi.getAll(),
    );

    const custom: ObjectInfo[] = [];
    for (const schema of response.results) {
      if (!isCustomObjectSchema(schema)) {
        logger.debug(`Skipping schema ${schema.name} - not a custom object`);
        continue;
      }
      const object = transformObjectSchema(schema);
      if (object) {
        custom.push(object);
      }
    }

    logger.info(`Found ${custom.length} custom objects`, {
      schemas: response.results.length,
    });
    return custom;
  }

  /**
   * Get all properties of an object type, with their validation rules.
   */
  async getProperties(objectType: string): Promise<HubSpotProperty[]> {
    logger.info(`Discovering HubSpot ${objectType} properties...`);

    const rulesByProperty = await this.getPropertyValidations(objectType);
    const properties: HubSpotProperty[] = [];
    let after: string | undefined;

    do {
      const params = new URLSearchParams({ limit: String(PAGE_SIZE) });
      if (after) {
        params.set("after", after);
      }

      const payload = await this.getJson(
        `/crm/v3/properties/${encodeURIComponent(objectType)}?${params.toString()}`,
        "Failed to fetch properties",
      );
      const page = propertyPageSchema.safeParse(payload);
      if (!page.success) {
        throw new HubSpotFetchError(
          `Failed to fetch properties: unexpected response for ${objectType}`,
        );
      }

      for (const raw of page.data.results ?? []) {
        const property = transformProperty(raw);
        if (property) {
          property.validationRules = rulesByProperty.get(property.name) ?? [];
          properties.push(property);
        }
      }

      after = page.data.paging?.next?.after;
    } while (after);

    logger.info(`Found ${properties.length} properties for ${objectType}`);
    return properties;
  }

  /**
   * Association definitions between every ordered pair of the given object
   * types. Endpoints are recorded as type ids.
   */
  async getAssociations(objectTypes: string[]): Promise<AssociationConfiguration[]> {
    const typeIds = Array.from(
      new Set(
        objectTypes
          .map(resolveObjectTypeId)
          .filter((id): id is string => id !== undefined),
      ),
    );

    const associations: AssociationConfiguration[] = [];
    for (const fromObjectType of typeIds) {
      for (const toObjectType of typeIds) {
        const response = await this.call("Failed to fetch associations", () =>
          this.client.crm.associations.v4.schema.definitionsApi.getAll(
            fromObjectType,
            toObjectType,
          ),
        );

        for (const definition of response.results) {
          const association = transformAssociationDefinition(
            definition,
            fromObjectType,
            toObjectType,
          );
          if (association) {
            associations.push(association);
          }
        }
      }
    }

    logger.info(`Found ${associations.length} association definitions`, {
      objectTypes: typeIds.length,
    });
    return associations;
  }

  private async getPropertyValidations(
    objectType: string,
  ): Promise<Map<string, PropertyValidationRule[]>> {
    const objectTypeId = resolveObjectTypeId(objectType);
    if (!objectTypeId) {
      logger.warn(`No object type ID mapping found for ${objectType}`);
      return new Map();
    }

    try {
      const payload = await this.getJson(
        `/crm/v3/property-validations/${objectTypeId}`,
        "Failed to fetch property validations",
      );
      return transformValidations(payload);
    } catch (error) {
      // Portals without validation rules answer with an error here
      logger.debug(`No validation rules found for ${objectType}`, {
        error: errorMessage(error),
        custom: isCustomObjectType(objectTypeId),
      });
      return new Map();
    }
  }

  private async getJson(path: string, context: string): Promise<unknown> {
    return this.call(context, async () => {
      const response = await this.client.apiRequest({ method: "GET", path });
      if (!response.ok) {
        const body = await response.text();
        throw new HubSpotFetchError(
          `${context}: HTTP ${response.status}`,
          response.status,
          body,
        );
      }
      const payload: unknown = await response.json();
      return payload;
    });
  }

  /**
   * Rate limit, time out, retry (429, 5xx and timeouts only) and wrap
   * failures as HubSpotFetchError.
   */
  private async call<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retry(
        async () => {
          await this.rateLimiter.waitForToken();
          try {
            // No status, so a timed out attempt is retried
            return await withTimeout(
              fn(),
              this.timeoutMs,
              () => new HubSpotFetchError(`${context}: timed out after ${this.timeoutMs}ms`),
            );
          } catch (error) {
            throw toFetchError(error, context);
          }
        },
        {
          maxRetries: this.maxRetries,
          delayMs: this.retryDelayMs,
          shouldRetry: (error) => error instanceof HubSpotFetchError && error.retryable,
        },
      );
    } catch (error) {
      const fetchError = toFetchError(error, context);
      logger.error(context, {
        error: fetchError.message,
        statusCode: fetchError.statusCode,
      });
      throw fetchError;
    }
  }
}
