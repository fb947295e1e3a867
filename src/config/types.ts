/**
 * Config type exports
 */

import type { AgentConfig, Config } from "./schema.js";

export type { AgentConfig, Config };
