/**
 * Capability Set - the allow-list of tool names one agent may invoke.
 *
 * Fail closed: an empty or missing list permits nothing. Names are kept
 * as configured even when no such tool is registered; the gateway turns
 * those into UnknownToolError at call time.
 *
 * @example
 * ```ts
 * const caps = CapabilitySet.fromConfig("support", ["get_ticket", "list_tickets"]);
 * caps.permits("get_ticket");    // true
 * caps.permits("create_ticket"); // false
 * ```
 */

export class CapabilitySet {
  private readonly allowed: ReadonlySet<string>;

  private constructor(
    readonly ownerId: string,
    allowed: Set<string>,
    readonly version: number,
  ) {
    this.allowed = allowed;
    Object.freeze(this);
  }

  static fromConfig(
    ownerId: string,
    names?: readonly string[] | null,
    version = 1,
  ): CapabilitySet {
    const allowed = new Set<string>();
    for (const raw of names ?? []) {
      const name = raw.trim();
      if (name) allowed.add(name);
    }
    return new CapabilitySet(ownerId, allowed, version);
  }

  static empty(ownerId: string): CapabilitySet {
    return CapabilitySet.fromConfig(ownerId, []);
  }

  /** Case-sensitive membership test. */
  permits(toolName: string): boolean {
    return this.allowed.has(toolName);
  }

  names(): string[] {
    return Array.from(this.allowed).sort();
  }

  get size(): number {
    return this.allowed.size;
  }

  isEmpty(): boolean {
    return this.allowed.size === 0;
  }

  /** A new set for the same owner with the next version number. */
  withNames(names: readonly string[]): CapabilitySet {
    return CapabilitySet.fromConfig(this.ownerId, names, this.version + 1);
  }
}
