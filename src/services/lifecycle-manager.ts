import { injectable, inject } from "inversify";
import type {
  ILifecycleManager,
  ILogger,
  IToolCatalog,
  ITransport,
  ITransportFactory,
  ServerDescriptor,
  ServerStatus,
  StartupReport,
  ToolDescriptor,
  Unsubscribe,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import {
  TransportDisconnected,
  TransportStartupError,
  errorMessage,
} from "../utils/gateway-errors.js";
import type { ServerDescriptorStore } from "./descriptor-store.js";

type StartOutcome =
  | { descriptor: ServerDescriptor; transport: ITransport; tools: ToolDescriptor[] }
  | { descriptor: ServerDescriptor; transport: ITransport; error: TransportStartupError };

/**
 * Owns every transport: opens them, keeps the catalog in step with them, and
 * closes them. Nothing else stops a transport.
 *
 * Startup:
 * 1. Every configured server starts concurrently
 * 2. Successful servers register their tools in configuration order, so a
 *    name collision always resolves to the later server in the config
 * 3. A server that fails is logged and left out; the rest carry on
 *
 * Shutdown stops transports in reverse configuration order.
 */
@injectable()
export class LifecycleManager implements ILifecycleManager {
  /** Every transport created, in configuration order. */
  private transports: ITransport[] = [];
  private live = new Map<string, ITransport>();
  private lastErrors = new Map<string, string>();
  private subscriptions = new Map<string, Unsubscribe[]>();
  private refreshChains = new Map<string, Promise<void>>();
  private started = false;
  private shuttingDown: Promise<void> | undefined;

  constructor(
    @inject(TYPES.ServerDescriptorStore) private store: ServerDescriptorStore,
    @inject(TYPES.TransportFactory) private factory: ITransportFactory,
    @inject(TYPES.ToolCatalog) private catalog: IToolCatalog,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async startAll(): Promise<StartupReport> {
    if (this.started) {
      throw new Error("Servers have already been started");
    }
    this.started = true;

    const descriptors = this.store.list();
    this.logger.info(`Starting ${descriptors.length} MCP servers...`);

    const outcomes = await Promise.all(
      descriptors.map((descriptor) => this.startServer(descriptor)),
    );

    const report: StartupReport = { started: [], failed: [] };

    for (const outcome of outcomes) {
      const name = outcome.descriptor.name;

      if ("error" in outcome) {
        this.lastErrors.set(name, outcome.error.message);
        report.failed.push({ serverName: name, error: outcome.error });
        this.logger.error(`Failed to initialize server ${name}`, outcome.error);
        continue;
      }

      if (this.shuttingDown) {
        const error = new TransportDisconnected(name, "gateway is shutting down");
        report.failed.push({ serverName: name, error });
        continue;
      }

      // Nobody was listening while the other servers started, so a
      // transport that closed in the meantime is caught here.
      if (outcome.transport.state === "closed") {
        const error = new TransportStartupError(
          name,
          "transport closed before its tools were registered",
        );
        this.lastErrors.set(name, error.message);
        report.failed.push({ serverName: name, error });
        this.logger.error(`Failed to initialize server ${name}`, error);
        await this.stopQuietly(outcome.transport);
        continue;
      }

      this.live.set(name, outcome.transport);
      this.subscribe(name, outcome.transport);
      this.catalog.register(name, outcome.tools);
      report.started.push(name);
      this.logger.info(
        `Successfully initialized ${name} (${outcome.tools.length} tools)`,
      );
    }

    this.logger.info(
      `Gateway ready: ${report.started.length}/${descriptors.length} servers up, ${this.catalog.list().length} tools in catalog`,
    );
    return report;
  }

  getTransport(serverName: string): ITransport | undefined {
    return this.live.get(serverName);
  }

  /**
   * Re-read one server's tool list and replace its catalog entries.
   * Refreshes of the same server run one after another, so an older list
   * never lands on top of a newer one. Never rejects.
   */
  refresh(serverName: string): Promise<void> {
    const previous = this.refreshChains.get(serverName) ?? Promise.resolve();
    const next = previous.then(() => this.refreshNow(serverName));
    this.refreshChains.set(serverName, next);
    return next.finally(() => {
      if (this.refreshChains.get(serverName) === next) {
        this.refreshChains.delete(serverName);
      }
    });
  }

  status(): ServerStatus[] {
    return this.store.list().map((descriptor) => {
      const transport = this.transports.find(
        (candidate) => candidate.serverName === descriptor.name,
      );
      return {
        name: descriptor.name,
        kind: descriptor.kind,
        state: transport?.state ?? "disconnected",
        toolCount: this.catalog.toolsOwnedBy(descriptor.name).length,
        lastError: this.lastErrors.get(descriptor.name),
      };
    });
  }

  shutdown(): Promise<void> {
    this.shuttingDown ??= this.stopAll();
    return this.shuttingDown;
  }

  private async startServer(descriptor: ServerDescriptor): Promise<StartOutcome> {
    const transport = this.factory.create(descriptor);
    this.transports.push(transport);

    try {
      await transport.start();
      const tools = await transport.listTools();
      return { descriptor, transport, tools };
    } catch (error) {
      await this.stopQuietly(transport);
      return {
        descriptor,
        transport,
        error:
          error instanceof TransportStartupError
            ? error
            : new TransportStartupError(descriptor.name, errorMessage(error), {
                cause: error,
              }),
      };
    }
  }

  private subscribe(serverName: string, transport: ITransport): void {
    this.subscriptions.set(serverName, [
      transport.onDisconnect((error) =>
        this.handleDisconnect(serverName, transport, error),
      ),
      transport.onReconnect(() => {
        this.lastErrors.delete(serverName);
        this.logger.info(
          `Server '${serverName}' reconnected, refreshing its tools`,
        );
        void this.refresh(serverName);
      }),
      transport.onToolListChanged(() => {
        void this.refresh(serverName);
      }),
    ]);
  }

  private handleDisconnect(
    serverName: string,
    transport: ITransport,
    error: Error,
  ): void {
    this.lastErrors.set(serverName, error.message);

    if (transport.state !== "closed") {
      this.logger.info(
        `Server '${serverName}' is ${transport.state}; its tools fail fast until it recovers`,
      );
      return;
    }

    if (this.live.get(serverName) === transport) {
      this.live.delete(serverName);
    }
    const removed = this.catalog.unregister(serverName);
    this.logger.error(
      `Server '${serverName}' is closed; removed ${removed.length} tools from the catalog`,
      error,
    );
  }

  private async refreshNow(serverName: string): Promise<void> {
    const transport = this.live.get(serverName);
    if (!transport || transport.state !== "ready") {
      this.logger.debug(
        `Skipping refresh of '${serverName}': transport is ${transport?.state ?? "not live"}`,
      );
      return;
    }

    try {
      const tools = await transport.listTools();
      if (this.live.get(serverName) !== transport) {
        return;
      }
      const summary = this.catalog.register(serverName, tools);
      if (summary.changed) {
        this.logger.info(
          `Refreshed tools for '${serverName}': ${summary.added.length} added, ${summary.removed.length} removed`,
        );
      }
    } catch (error) {
      this.lastErrors.set(serverName, errorMessage(error));
      this.logger.error(`Failed to refresh tools for '${serverName}'`, error);
    }
  }

  private async stopAll(): Promise<void> {
    const ordered = [...this.transports].reverse();
    this.logger.info(`Closing all ${ordered.length} transports...`);

    for (const transport of ordered) {
      const name = transport.serverName;
      for (const unsubscribe of this.subscriptions.get(name) ?? []) {
        unsubscribe();
      }
      this.subscriptions.delete(name);
      this.live.delete(name);

      await this.stopQuietly(transport);
      this.logger.info(`Closed MCP client ${name}`);
    }

    this.logger.info("All transports closed");
  }

  private async stopQuietly(transport: ITransport): Promise<void> {
    try {
      await transport.stop();
    } catch (error) {
      this.logger.error(
        `Error closing transport for server '${transport.serverName}'`,
        error,
      );
    }
  }
}
