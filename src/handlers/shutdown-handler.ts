import { injectable, inject } from "inversify";
import type {
  ILifecycleManager,
  ILogger,
  IShutdownHandler,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import type { GatewayServer } from "../mcp/gateway-server.js";

/**
 * Handler for graceful shutdown of the gateway.
 *
 * Shutdown order:
 * 1. Stop every server transport, in reverse configuration order
 * 2. Close the front-facing MCP server
 *
 * Repeated calls (a second SIGINT, say) share the first run. Exiting the
 * process is left to the caller.
 */
@injectable()
export class ShutdownHandler implements IShutdownHandler {
  private running: Promise<void> | undefined;

  constructor(
    @inject(TYPES.LifecycleManager) private lifecycle: ILifecycleManager,
    @inject(TYPES.GatewayServer) private gatewayServer: GatewayServer,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  shutdown(): Promise<void> {
    this.running ??= this.run();
    return this.running;
  }

  private async run(): Promise<void> {
    this.logger.info("Shutting down...");

    await this.lifecycle.shutdown();

    try {
      await this.gatewayServer.close();
    } catch (error) {
      this.logger.error("Error closing gateway server", error);
    }

    this.logger.info("Shutdown complete");
  }
}
