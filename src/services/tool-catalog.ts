import { injectable, inject } from "inversify";
import { isDeepStrictEqual } from "node:util";
import type {
  ILogger,
  IToolCatalog,
  RegistrationSummary,
  ToolDescriptor,
  Unsubscribe,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";

/**
 * Merged, name-addressable table of every tool the live servers advertise.
 *
 * Conflict policy is last-write-wins: when two servers advertise the same
 * name, the entry belongs to whichever registered it most recently and the
 * other server's entry is dropped. Names are never namespace-qualified.
 *
 * All writes are synchronous, so no two can interleave.
 */
@injectable()
export class ToolCatalog implements IToolCatalog {
  private entries = new Map<string, ToolDescriptor>();
  /** Tool names each server currently owns in `entries`. */
  private owned = new Map<string, Set<string>>();
  /** The list each server last registered, as it was given. */
  private registered = new Map<string, ToolDescriptor[]>();
  private listeners = new Set<() => void>();

  constructor(@inject(TYPES.Logger) private logger: ILogger) {}

  register(serverName: string, tools: ToolDescriptor[]): RegistrationSummary {
    const incoming = tools.map((tool) => ({ ...tool, owner: serverName }));

    if (this.isCurrent(serverName, incoming)) {
      this.logger.debug(
        `Catalog: tool list for '${serverName}' unchanged (${incoming.length} tools)`,
      );
      return { added: [], removed: [], overridden: [], changed: false };
    }

    const before = new Set(this.owned.get(serverName));
    this.dropOwnedEntries(serverName);

    const owned = new Set<string>();
    const overridden: RegistrationSummary["overridden"] = [];

    for (const tool of incoming) {
      const existing = this.entries.get(tool.name);
      if (existing && existing.owner !== serverName) {
        this.owned.get(existing.owner)?.delete(tool.name);
        overridden.push({ tool: tool.name, previousOwner: existing.owner });
        this.logger.info(
          `Catalog: tool '${tool.name}' from '${serverName}' replaces the one from '${existing.owner}'`,
        );
      }
      this.entries.set(tool.name, tool);
      owned.add(tool.name);
    }

    this.owned.set(serverName, owned);
    this.registered.set(serverName, incoming);

    const added = Array.from(owned).filter((name) => !before.has(name));
    const removed = Array.from(before).filter((name) => !owned.has(name));

    this.logger.info(
      `Catalog: registered ${owned.size} tools from '${serverName}'`,
    );
    this.emitChange();

    return { added, removed, overridden, changed: true };
  }

  unregister(serverName: string): string[] {
    const removed = Array.from(this.owned.get(serverName) ?? []);
    this.dropOwnedEntries(serverName);
    this.owned.delete(serverName);
    this.registered.delete(serverName);

    if (removed.length > 0) {
      this.logger.info(
        `Catalog: removed ${removed.length} tools from '${serverName}'`,
      );
      this.emitChange();
    }
    return removed;
  }

  lookup(toolName: string): string | undefined {
    return this.entries.get(toolName)?.owner;
  }

  get(toolName: string): ToolDescriptor | undefined {
    return this.entries.get(toolName);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.entries.values());
  }

  snapshot(): ReadonlyMap<string, ToolDescriptor> {
    return new Map(this.entries);
  }

  toolsOwnedBy(serverName: string): string[] {
    return Array.from(this.owned.get(serverName) ?? []);
  }

  onChange(listener: () => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  get size(): number {
    return this.entries.size;
  }

  /** True when the server already owns exactly this list in the catalog. */
  private isCurrent(serverName: string, incoming: ToolDescriptor[]): boolean {
    const previous = this.registered.get(serverName);
    const owned = this.owned.get(serverName);
    return (
      previous !== undefined &&
      owned !== undefined &&
      owned.size === previous.length &&
      isDeepStrictEqual(previous, incoming)
    );
  }

  private dropOwnedEntries(serverName: string): void {
    for (const name of this.owned.get(serverName) ?? []) {
      if (this.entries.get(name)?.owner === serverName) {
        this.entries.delete(name);
      }
    }
  }

  private emitChange(): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        listener();
      } catch (error) {
        this.logger.error("Catalog change listener failed", error);
      }
    }
  }
}
