import { randomBytes } from "node:crypto";
import { SessionNotFoundError } from "../errors";
import type { PortalSchemaSource } from "../types";
import logger from "../utils/logger";
import { SessionCache } from "./schema-cache";

export interface Portal {
  name: string;
  source: PortalSchemaSource;
}

export interface Session {
  id: string;
  portalA: Portal;
  portalB: Portal;
  createdAt: number;
  lastAccessed: number;
  cache: SessionCache;
}

export interface SessionStoreOptions {
  timeoutMs: number;
  cleanupIntervalMs: number;
  cacheTtlMs: number;
  now?: () => number;
}

/**
 * Process-local sessions holding both portals' clients and their cached
 * schema data. Sessions expire after a period without access.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();
  private lastCleanup: number;
  private now: () => number;

  constructor(private options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  get size(): number {
    return this.sessions.size;
  }

  create(portalA: Portal, portalB: Portal): Session {
    this.cleanupExpired();

    const now = this.now();
    const session: Session = {
      id: randomBytes(16).toString("hex"),
      portalA,
      portalB,
      createdAt: now,
      lastAccessed: now,
      cache: new SessionCache(this.options.cacheTtlMs, this.now),
    };

    this.sessions.set(session.id, session);
    logger.info(`Created new session (${portalA.name} vs ${portalB.name})`, {
      sessionId: session.id,
    });
    return session;
  }

  /**
   * Look up a live session and mark it as accessed.
   */
  get(sessionId: string): Session {
    this.cleanupExpired();

    const session = this.sessions.get(sessionId);
    if (!session || this.isExpired(session)) {
      this.sessions.delete(sessionId);
      throw new SessionNotFoundError(sessionId);
    }

    session.lastAccessed = this.now();
    return session;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Remove idle sessions. Runs at most once per cleanup interval unless forced.
   */
  cleanupExpired(force = false): number {
    const now = this.now();
    if (!force && now - this.lastCleanup < this.options.cleanupIntervalMs) {
      return 0;
    }

    let removed = 0;
    for (const [sessionId, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(sessionId);
        removed++;
        logger.info("Cleaned up expired session", { sessionId });
      }
    }

    this.lastCleanup = now;
    return removed;
  }

  private isExpired(session: Session): boolean {
    return this.now() - session.lastAccessed > this.options.timeoutMs;
  }
}
