export { BackendClient, type BackendClientOptions } from "./backend-client.js";
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from "./circuit-breaker.js";
export { createBuiltinTools, createToolRegistry, type BuiltinToolsOptions } from "./factory.js";
export { createSystemHealthTool } from "./system.js";
export {
  createCreateTicketTool,
  createListTicketsTool,
  createSearchTicketsTool,
  createGetTicketTool,
} from "./tickets.js";
export { createListIntegrationsTool, createGetActiveIntegrationsTool } from "./integrations.js";
