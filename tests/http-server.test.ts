import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { HubSpotFetchError } from "../src/errors";
import { HttpServer } from "../src/server/http-server";
import { SessionStore } from "../src/services/session-store";
import { FakeSource, makeProperty } from "./helpers";

const sessionResponseSchema = z.object({ session_id: z.string() });

describe("HttpServer", () => {
  let server: HttpServer;
  let sources: Map<string, FakeSource>;

  beforeEach(async () => {
    sources = new Map([
      [
        "test-token-a",
        new FakeSource({
          properties: { contacts: [makeProperty({ name: "email", label: "Email" })] },
        }),
      ],
      [
        "test-token-b",
        new FakeSource({
          properties: { contacts: [makeProperty({ name: "email", label: "Email Address" })] },
        }),
      ],
      [
        "test-token-broken",
        new FakeSource({
          failWith: new HubSpotFetchError("Failed to fetch properties: HTTP 500", 500),
        }),
      ],
    ]);

    server = new HttpServer({
      port: 0,
      host: "127.0.0.1",
      sessions: new SessionStore({
        timeoutMs: 3_600_000,
        cleanupIntervalMs: 300_000,
        cacheTtlMs: 900_000,
      }),
      createSource: (token) => sources.get(token) ?? new FakeSource({ valid: false }),
      associationObjectTypes: ["contacts"],
    });
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  async function request(path: string, init?: RequestInit) {
    const response = await fetch(`http://127.0.0.1:${server.port}${path}`, init);
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  function post(path: string, payload: unknown) {
    return request(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
  }

  async function openSession(tokenB = "test-token-b"): Promise<string> {
    const { body } = await post("/validate-tokens", {
      portal_a_name: "Production",
      portal_a_token: "test-token-a",
      portal_b_name: "Sandbox",
      portal_b_token: tokenB,
    });
    return sessionResponseSchema.parse(body).session_id;
  }

  it("answers health checks", async () => {
    const { status, body } = await request("/health");

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: "ok" });
  });

  it("opens a session for valid tokens", async () => {
    const { status, body } = await post("/validate-tokens", {
      portal_a_token: "test-token-a",
      portal_b_token: "test-token-b",
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({ success: true, message: "Tokens validated successfully" });
    expect(sources.get("test-token-a")?.calls.validateToken).toBe(1);
  });

  it("falls back to default names for blank portal names", async () => {
    const { body } = await post("/validate-tokens", {
      portal_a_name: "  ",
      portal_a_token: "test-token-a",
      portal_b_token: "test-token-b",
    });
    const sessionId = sessionResponseSchema.parse(body).session_id;

    const matching = await request(`/custom-object-matching/${sessionId}`);

    expect(matching).toEqual({
      status: 200,
      body: {
        portal_a_name: "Portal A",
        portal_b_name: "Portal B",
        portal_a: [],
        portal_b: [],
        portal_b_only: [],
      },
    });
  });

  it("rejects tokens the portal refuses", async () => {
    const { status, body } = await post("/validate-tokens", {
      portal_a_token: "test-token-a",
      portal_b_token: "test-secret",
    });

    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: "Token validation failed: HTTP 401" });
  });

  it("rejects a request without tokens", async () => {
    const { status, body } = await post("/validate-tokens", { portal_a_token: "test-token-a" });

    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: "Invalid request",
      issues: ["portal_b_token: Required"],
    });
  });

  it("rejects malformed JSON", async () => {
    const { status, body } = await request("/validate-tokens", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: "Invalid request" });
  });

  it("compares an object type between the session's portals", async () => {
    const sessionId = await openSession();

    const { status, body } = await request(`/compare/${sessionId}/contacts`);

    expect(status).toBe(200);
    expect(body).toMatchObject({
      portal_a_name: "Production",
      portal_b_name: "Sandbox",
      comparison: {
        object_type: "contacts",
        total_properties_a: 1,
        total_properties_b: 1,
        different_count: 1,
        comparisons: [
          {
            property_name: "email",
            status: "different",
            differences: [
              {
                field_name: "Label",
                portal_a_value: "Email",
                portal_b_value: "Email Address",
                status: "different",
              },
            ],
          },
        ],
      },
    });
  });

  it("returns 404 for an unknown session", async () => {
    const { status, body } = await request("/compare/not-a-session/contacts");

    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: "Session not found or expired" });
  });

  it("returns 404 when neither property exists", async () => {
    const sessionId = await openSession();

    const { status, body } = await request(
      `/compare-property/${sessionId}/contacts/nope/contacts/none`,
    );

    expect(status).toBe(404);
    expect(body).toEqual({
      success: false,
      error: "Property not found in either portal: nope, none",
    });
  });

  it("returns 502 when a portal cannot be read", async () => {
    const sessionId = await openSession("test-token-broken");

    const { status, body } = await request(`/compare/${sessionId}/contacts`);

    expect(status).toBe(502);
    expect(body).toEqual({ success: false, error: "Failed to fetch properties: HTTP 500" });
  });

  it("refreshes and reports the session cache", async () => {
    const sessionId = await openSession();
    await request(`/properties/${sessionId}/contacts`);

    const before = await request(`/cache-status/${sessionId}`);
    expect(before.body).toMatchObject({ properties: { contacts: { cached: true, valid: true } } });

    const refreshed = await request(`/refresh-cache/${sessionId}?object_type=contacts`, {
      method: "POST",
    });
    expect(refreshed.body).toEqual({ success: true, message: "Cache refreshed for contacts" });

    const after = await request(`/cache-status/${sessionId}`);
    expect(after.body).toEqual({
      objects: { cached: false, valid: false, age_seconds: null },
      properties: {},
      associations: { cached: false, valid: false, age_seconds: null },
    });

    const all = await request(`/refresh-cache/${sessionId}`, { method: "POST" });
    expect(all.body).toEqual({ success: true, message: "All cache refreshed" });
  });

  it("ends a session", async () => {
    const sessionId = await openSession();

    const ended = await request(`/sessions/${sessionId}`, { method: "DELETE" });
    expect(ended).toEqual({ status: 200, body: { success: true, message: "Session ended" } });

    const { status } = await request(`/objects/${sessionId}`);
    expect(status).toBe(404);
  });
});
