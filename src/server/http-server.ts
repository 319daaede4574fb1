/**
 * JSON API for comparing two portals
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { z, ZodError } from "zod";
import {
  HubSpotFetchError,
  PropertyNotFoundError,
  SessionNotFoundError,
  errorMessage,
} from "../errors";
import { isPrivateAppTokenFormat } from "../extractors/hubspot";
import { ComparisonService } from "../services/comparison";
import type { SessionStore } from "../services/session-store";
import type { PortalSchemaSource } from "../types";
import logger from "../utils/logger";

export interface HttpServerConfig {
  port: number;
  host: string;
  sessions: SessionStore;
  createSource: (accessToken: string) => PortalSchemaSource;
  associationObjectTypes: readonly string[];
}

// Blank or missing names fall back to the default
const portalName = (fallback: string) =>
  z
    .string()
    .trim()
    .nullish()
    .transform((name) => name || fallback);

const validateTokensSchema = z.object({
  portal_a_name: portalName("Portal A"),
  portal_a_token: z.string().trim().min(1),
  portal_b_name: portalName("Portal B"),
  portal_b_token: z.string().trim().min(1),
});

export interface ErrorResponse {
  success: false;
  error: string;
  issues?: string[];
}

/**
 * HTTP server for handling API requests
 */
export class HttpServer {
  private app: Express;
  private server?: ReturnType<Express["listen"]>;

  constructor(private config: HttpServerConfig) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.app.use(this.errorHandler);
  }

  /**
   * Port actually bound, which differs from the configured one when it is 0
   */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: false }));

    // Request logging
    this.app.use((req, _res, next) => {
      logger.debug("HTTP request", { method: req.method, path: req.path });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get("/health", (_req: Request, res: Response) => {
      res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    this.app.post(
      "/validate-tokens",
      this.route(async (req, res) => {
        const body = validateTokensSchema.parse(req.body);

        for (const token of [body.portal_a_token, body.portal_b_token]) {
          if (!isPrivateAppTokenFormat(token)) {
            logger.warn("Token does not look like a private app token");
          }
        }

        const sourceA = this.config.createSource(body.portal_a_token);
        const sourceB = this.config.createSource(body.portal_b_token);

        try {
          await Promise.all([sourceA.validateToken(), sourceB.validateToken()]);
        } catch (error) {
          logger.error("Token validation failed", { error: errorMessage(error) });
          res.status(400).json({
            success: false,
            error: `Token validation failed: ${errorMessage(error)}`,
          } satisfies ErrorResponse);
          return;
        }

        const session = this.config.sessions.create(
          { name: body.portal_a_name, source: sourceA },
          { name: body.portal_b_name, source: sourceB },
        );

        res.json({
          success: true,
          session_id: session.id,
          message: "Tokens validated successfully",
        });
      }),
    );

    this.app.delete(
      "/sessions/:sessionId",
      this.route(async (req, res) => {
        if (!this.config.sessions.delete(req.params.sessionId)) {
          throw new SessionNotFoundError(req.params.sessionId);
        }
        res.json({ success: true, message: "Session ended" });
      }),
    );

    this.app.get(
      "/objects/:sessionId",
      this.route(async (req, res) => {
        res.json(await this.service(req.params.sessionId).getObjects());
      }),
    );

    this.app.get(
      "/properties/:sessionId/:objectType",
      this.route(async (req, res) => {
        const { objectType } = req.params;
        const properties = await this.service(req.params.sessionId).getProperties(objectType);
        res.json({ ...properties, object_type: objectType });
      }),
    );

    this.app.get(
      "/compare/:sessionId/:objectType",
      this.route(async (req, res) => {
        const service = this.service(req.params.sessionId);
        const comparison = await service.compareObjectProperties(req.params.objectType);
        res.json({ ...this.portalNames(req.params.sessionId), comparison });
      }),
    );

    this.app.get(
      "/custom-object-matching/:sessionId",
      this.route(async (req, res) => {
        const { sessionId } = req.params;
        const matching = await this.service(sessionId).customObjectMatching();
        res.json({ ...this.portalNames(sessionId), ...matching });
      }),
    );

    this.app.get(
      "/compare-custom/:sessionId/:portalAId/:portalBId",
      this.route(async (req, res) => {
        const { sessionId, portalAId, portalBId } = req.params;
        const comparison = await this.service(sessionId).compareCustomObjects(
          portalAId,
          portalBId,
        );
        res.json({ ...this.portalNames(sessionId), comparison });
      }),
    );

    this.app.get(
      "/compare-property/:sessionId/:objectTypeA/:propertyA/:objectTypeB/:propertyB",
      this.route(async (req, res) => {
        const { sessionId, objectTypeA, propertyA, objectTypeB, propertyB } = req.params;
        const comparison = await this.service(sessionId).comparePropertyPair(
          objectTypeA,
          propertyA,
          objectTypeB,
          propertyB,
        );
        res.json({ ...this.portalNames(sessionId), comparison });
      }),
    );

    this.app.get(
      "/compare-associations/:sessionId",
      this.route(async (req, res) => {
        const { sessionId } = req.params;
        const comparison = await this.service(sessionId).compareAssociations();
        res.json({ ...this.portalNames(sessionId), comparison });
      }),
    );

    this.app.post(
      "/refresh-cache/:sessionId",
      this.route(async (req, res) => {
        const objectType =
          typeof req.query.object_type === "string" && req.query.object_type
            ? req.query.object_type
            : undefined;

        this.service(req.params.sessionId).refreshCache(objectType);
        res.json({
          success: true,
          message: objectType ? `Cache refreshed for ${objectType}` : "All cache refreshed",
        });
      }),
    );

    this.app.get(
      "/cache-status/:sessionId",
      this.route(async (req, res) => {
        res.json(this.service(req.params.sessionId).cacheStatus());
      }),
    );
  }

  private service(sessionId: string): ComparisonService {
    const session = this.config.sessions.get(sessionId);
    return new ComparisonService(session, {
      associationObjectTypes: this.config.associationObjectTypes,
    });
  }

  private portalNames(sessionId: string) {
    const session = this.config.sessions.get(sessionId);
    return {
      portal_a_name: session.portalA.name,
      portal_b_name: session.portalB.name,
    };
  }

  /**
   * Forward rejected handlers to the error handler
   */
  private route(
    handler: (req: Request, res: Response) => Promise<void>,
  ): RequestHandler {
    return (req, res, next) => {
      handler(req, res).catch(next);
    };
  }

  private errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    let status = 500;
    const body: ErrorResponse = { success: false, error: errorMessage(error) };

    if (error instanceof ZodError) {
      status = 400;
      body.error = "Invalid request";
      body.issues = error.issues.map(
        (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`,
      );
    } else if (
      error instanceof SessionNotFoundError ||
      error instanceof PropertyNotFoundError
    ) {
      status = 404;
    } else if (error instanceof HubSpotFetchError) {
      status = 502;
    } else if (
      typeof error === "object" &&
      error !== null &&
      "type" in error &&
      error.type === "entity.parse.failed"
    ) {
      // Malformed JSON body
      status = 400;
      body.error = "Invalid request";
    }

    if (status >= 500) {
      logger.error("Request failed", {
        method: req.method,
        path: req.path,
        error: body.error,
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      logger.warn("Request rejected", { method: req.method, path: req.path, status });
    }

    res.status(status).json(body);
  };

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        logger.info("HTTP server started", {
          host: this.config.host,
          port: this.port,
          url: `http://${this.config.host}:${this.port}`,
        });
        resolve();
      });

      this.server.on("error", (error) => {
        logger.error("HTTP server error", { error: error.message });
        reject(error);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error) => {
        if (error) {
          logger.error("Error stopping HTTP server", { error: error.message });
          reject(error);
        } else {
          logger.info("HTTP server stopped");
          resolve();
        }
      });
    });
  }
}
