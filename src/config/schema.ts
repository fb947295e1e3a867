import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../tools/interface.js";

const toolNameSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z0-9_.-]+$/, "tool names may only contain letters, digits, _ . -");

export const agentSchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().optional(),
  // Missing list means no tools (fail closed), never "all tools".
  tools: z.array(toolNameSchema).default([]),
});

export const configSchema = z.object({
  backend: z
    .object({
      baseUrl: z.string().url().default("http://localhost:8000"),
      token: z.string().optional(),
      circuitBreaker: z
        .object({
          failureThreshold: z.number().int().min(1).default(5),
          recoveryTimeoutMs: z.number().int().min(0).default(30_000),
        })
        .default({}),
    })
    .default({}),
  gateway: z
    .object({
      defaultTimeoutMs: z.number().int().min(0).max(MAX_TIMEOUT_MS).default(30_000),
    })
    .default({}),
  ledger: z
    .object({
      dir: z.string().optional(),
    })
    .default({}),
  agents: z.array(agentSchema).default([]),
}).superRefine((cfg, ctx) => {
  const seen = new Set<string>();
  cfg.agents.forEach((agent, i) => {
    if (seen.has(agent.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["agents", i, "id"],
        message: `duplicate agent id '${agent.id}'`,
      });
    }
    seen.add(agent.id);
  });
});

export type Config = z.infer<typeof configSchema>;
export type AgentConfig = z.infer<typeof agentSchema>;
