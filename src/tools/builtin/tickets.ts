/**
 * Ticket tools: create, list, search and fetch support tickets.
 */

import type { ToolDefinition } from "../interface.js";
import type { BackendClient, QueryValue } from "./backend-client.js";

const TICKETS = "/api/v1/tickets";

const PRIORITIES = ["low", "medium", "high", "critical"] as const;
const STATUSES = ["new", "open", "in_progress", "resolved", "closed"] as const;

function pick(args: Record<string, unknown>, keys: readonly string[]): Record<string, QueryValue> {
  const out: Record<string, QueryValue> = {};
  for (const key of keys) {
    const v = args[key];
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      out[key] = v;
    }
  }
  return out;
}

export function createCreateTicketTool(backend: BackendClient): ToolDefinition {
  return {
    name: "create_ticket",
    description: "Create a support ticket.",
    category: "tickets",
    parameters: {
      type: "object",
      properties: {
        title: { type: "string", description: "Short summary of the issue" },
        description: { type: "string", description: "Detailed description" },
        category: { type: "string", description: "Ticket category (e.g. technical, billing)" },
        priority: { type: "string", enum: PRIORITIES, description: "Default: medium" },
        urgency: { type: "string", enum: PRIORITIES },
        department: { type: "string" },
        integration_id: { type: "string", description: "Route the ticket to this integration" },
        attachments: {
          type: "array",
          items: { type: "string" },
          description: "File ids to attach",
        },
      },
      required: ["title", "description"],
    },
    security: { level: "write" },
    async execute(args, ctx) {
      const body: Record<string, unknown> = {
        priority: "medium",
        ...args,
      };
      if (Array.isArray(args.attachments)) {
        body.attachments = args.attachments.map((fileId) => ({ file_id: fileId }));
      }
      return backend.post(TICKETS, body, ctx.signal);
    },
  };
}

export function createListTicketsTool(backend: BackendClient): ToolDefinition {
  return {
    name: "list_tickets",
    description: "List tickets with optional filters and pagination.",
    category: "tickets",
    parameters: {
      type: "object",
      properties: {
        page: { type: "integer", description: "1-indexed page (default: 1)" },
        page_size: { type: "integer", description: "Items per page (default: 10)" },
        status: { type: "string", enum: STATUSES },
        category: { type: "string" },
        priority: { type: "string", enum: PRIORITIES },
      },
    },
    security: { level: "read" },
    async execute(args, ctx) {
      return backend.get(
        TICKETS,
        { page: 1, page_size: 10, ...pick(args, ["page", "page_size", "status", "category", "priority"]) },
        ctx.signal,
      );
    },
  };
}

export function createSearchTicketsTool(backend: BackendClient): ToolDefinition {
  return {
    name: "search_tickets",
    description: "Search tickets by text with optional filters.",
    category: "tickets",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "Text to search in title and description" },
        status: { type: "string", enum: STATUSES },
        category: { type: "string" },
        priority: { type: "string", enum: PRIORITIES },
        page: { type: "integer" },
        page_size: { type: "integer" },
      },
      required: ["query"],
    },
    security: { level: "read" },
    async execute(args, ctx) {
      const { query, ...rest } = args;
      return backend.get(
        TICKETS,
        {
          q: typeof query === "string" ? query : undefined,
          page: 1,
          page_size: 10,
          ...pick(rest, ["status", "category", "priority", "page", "page_size"]),
        },
        ctx.signal,
      );
    },
  };
}

export function createGetTicketTool(backend: BackendClient): ToolDefinition {
  return {
    name: "get_ticket",
    description: "Get one ticket by id.",
    category: "tickets",
    parameters: {
      type: "object",
      properties: {
        ticket_id: { type: "string" },
      },
      required: ["ticket_id"],
    },
    security: { level: "read" },
    async execute(args, ctx) {
      const id = encodeURIComponent(String(args.ticket_id));
      return backend.get(`${TICKETS}/${id}`, undefined, ctx.signal);
    },
  };
}
