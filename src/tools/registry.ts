/**
 * Tool registry: the authoritative name -> definition map.
 *
 * The map is an immutable snapshot that is swapped on every change, so a
 * reader holding the previous snapshot never sees a partial update.
 */

import { createLogger } from "../utils/logger.js";
import { DuplicateToolError, UnknownToolError } from "../errors.js";
import type { ModelTool, ToolDefinition } from "./interface.js";

const log = createLogger("tools");

export interface ListToolsOptions {
  category?: string;
}

export class ToolRegistry {
  private tools: ReadonlyMap<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    const frozen: ToolDefinition = Object.freeze({
      ...tool,
      security: Object.freeze({ ...tool.security }),
    });
    const next = new Map(this.tools);
    next.set(tool.name, frozen);
    this.tools = next;
    log.debug({ tool: tool.name, category: tool.category }, "registered tool");
  }

  /**
   * Remove a deprecated tool. Capability sets that still list it will get
   * UnknownToolError on invocation.
   */
  unregister(name: string): boolean {
    if (!this.tools.has(name)) return false;
    const next = new Map(this.tools);
    next.delete(name);
    this.tools = next;
    log.warn({ tool: name }, "tool unregistered; agents still listing it will be refused");
    return true;
  }

  lookup(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Introspection only. Never use this for authorization. */
  listNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }

  list(opts: ListToolsOptions = {}): ToolDefinition[] {
    const all = Array.from(this.tools.values());
    if (opts.category === undefined) return all;
    return all.filter((t) => t.category === opts.category);
  }

  categories(): string[] {
    return Array.from(new Set(this.list().map((t) => t.category))).sort();
  }

  get size(): number {
    return this.tools.size;
  }

  /** Tool list in the shape model APIs expect. Unknown names are skipped. */
  toModelFormat(names?: Iterable<string>): ModelTool[] {
    const tools = names
      ? Array.from(names).flatMap((n) => {
          const t = this.tools.get(n);
          return t ? [t] : [];
        })
      : this.list();
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.parameters,
    }));
  }
}
