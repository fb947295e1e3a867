import { describe, it, expect } from "vitest";
import { BackendClient } from "../backend-client.js";
import { createBuiltinTools, createToolRegistry } from "../factory.js";
import { BackendError } from "../../../errors.js";
import type { ToolContext } from "../../interface.js";

interface SeenRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: unknown;
}

function createFakeFetch(status = 200, body: unknown = { ok: true }) {
  const seen: SeenRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((v, k) => {
      headers[k] = v;
    });
    seen.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
  };
  return { seen, fetchImpl };
}

function ctx(): ToolContext {
  return {
    callId: "c1",
    callerId: "support",
    contextId: "thread-1",
    signal: new AbortController().signal,
  };
}

function setup(status?: number, body?: unknown) {
  const { seen, fetchImpl } = createFakeFetch(status, body);
  const backend = new BackendClient({
    baseUrl: "http://backend.test/",
    token: "test-token",
    fetchImpl,
  });
  const registry = createToolRegistry(createBuiltinTools({ backend }));
  return { seen, registry };
}

describe("builtin tools", () => {
  it("registers every builtin once", () => {
    const { registry } = setup();
    expect(registry.listNames()).toEqual([
      "create_ticket",
      "get_active_integrations",
      "get_system_health",
      "get_ticket",
      "list_integrations",
      "list_tickets",
      "search_tickets",
    ]);
    expect(registry.categories()).toEqual(["integrations", "system", "tickets"]);
  });

  it("get_system_health calls /health with the bearer token", async () => {
    const { seen, registry } = setup(200, { status: "healthy" });

    const result = await registry.lookup("get_system_health").execute({}, ctx());

    expect(result).toEqual({ status: "healthy" });
    expect(seen[0].url).toBe("http://backend.test/health");
    expect(seen[0].headers.authorization).toBe("Bearer test-token");
  });

  it("create_ticket posts the ticket with default priority and attachment ids", async () => {
    const { seen, registry } = setup(201, { id: "T-1" });

    await registry
      .lookup("create_ticket")
      .execute({ title: "VPN down", description: "Cannot connect", attachments: ["f-1"] }, ctx());

    expect(seen[0]).toMatchObject({
      url: "http://backend.test/api/v1/tickets",
      method: "POST",
      body: {
        priority: "medium",
        title: "VPN down",
        description: "Cannot connect",
        attachments: [{ file_id: "f-1" }],
      },
    });
    expect(seen[0].headers["content-type"]).toBe("application/json");
  });

  it("list_tickets sends pagination defaults and filters", async () => {
    const { seen, registry } = setup();

    await registry.lookup("list_tickets").execute({ status: "open", page_size: 25 }, ctx());

    expect(seen[0].url).toBe(
      "http://backend.test/api/v1/tickets?page=1&page_size=25&status=open",
    );
  });

  it("search_tickets maps query to q", async () => {
    const { seen, registry } = setup();

    await registry.lookup("search_tickets").execute({ query: "vpn issue" }, ctx());

    expect(seen[0].url).toBe("http://backend.test/api/v1/tickets?q=vpn+issue&page=1&page_size=10");
  });

  it("get_ticket encodes the id", async () => {
    const { seen, registry } = setup();

    await registry.lookup("get_ticket").execute({ ticket_id: "a/b" }, ctx());

    expect(seen[0].url).toBe("http://backend.test/api/v1/tickets/a%2Fb");
  });

  it("integration tools hit their endpoints", async () => {
    const { seen, registry } = setup();

    await registry.lookup("list_integrations").execute({ integration_type: "jira" }, ctx());
    await registry.lookup("get_active_integrations").execute({}, ctx());

    expect(seen.map((s) => s.url)).toEqual([
      "http://backend.test/api/v1/integrations?integration_type=jira",
      "http://backend.test/api/v1/integrations/active",
    ]);
  });

  it("throws BackendError on non-2xx responses", async () => {
    const { registry } = setup(503, "maintenance");

    await expect(registry.lookup("get_system_health").execute({}, ctx())).rejects.toThrow(
      BackendError,
    );
    await expect(registry.lookup("get_system_health").execute({}, ctx())).rejects.toThrow(
      "HTTP 503 from /health: maintenance",
    );
  });
});

describe("BackendClient", () => {
  it("omits the auth header without a token and returns text bodies as-is", async () => {
    const { seen, fetchImpl } = createFakeFetch(200, "plain text");
    const client = new BackendClient({ baseUrl: "http://backend.test", fetchImpl });

    expect(await client.get("/health")).toBe("plain text");
    expect(seen[0].headers.authorization).toBeUndefined();
  });

  it("returns null for an empty body", async () => {
    const { fetchImpl } = createFakeFetch(200, "");
    const client = new BackendClient({ baseUrl: "http://backend.test", fetchImpl });

    expect(await client.post("/api/v1/tickets", {})).toBeNull();
  });
});
