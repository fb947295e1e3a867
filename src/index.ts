export * from "./errors.js";
export type { Config, AgentConfig } from "./config/types.js";
export { loadConfig, parseConfig } from "./config/loader.js";
export type {
  JsonSchema,
  ModelTool,
  ToolArguments,
  ToolContext,
  ToolDefinition,
  ToolExecutor,
} from "./tools/interface.js";
export { MAX_TIMEOUT_MS } from "./tools/interface.js";
export { ToolRegistry } from "./tools/registry.js";
export { validateArguments } from "./tools/validate.js";
export * from "./tools/builtin/index.js";
export { CapabilitySet } from "./policy/capability-set.js";
export { CapabilityStore, type AgentToolConfig } from "./policy/capability-store.js";
export { filterToolsByCapabilities, visibleTools, unresolvedCapabilities } from "./policy/filter.js";
export {
  describeOutcome,
  isRefusal,
  toToolCall,
  type CallError,
  type CallErrorKind,
  type CallRecord,
  type ToolCallEntry,
} from "./gateway/call-record.js";
export { CallLedger, type LedgerSink } from "./gateway/ledger.js";
export { InvocationGateway, type InvokeRequest } from "./gateway/gateway.js";
export { ContextManager, InvocationContext } from "./gateway/context.js";
export { JsonlLedgerSink, readLedgerFile, type LedgerLine } from "./ledger/jsonl-sink.js";
export { createToolgate, type Toolgate } from "./app.js";
