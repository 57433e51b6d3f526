import { injectable, inject } from "inversify";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type {
  DispatchResult,
  GatewayConfig,
  IDispatcher,
  ILogger,
  IToolCatalog,
  ITransportRegistry,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import {
  ToolNotFoundError,
  TransportDisconnected,
  toGatewayError,
} from "../utils/gateway-errors.js";

/**
 * Entry point for the orchestrator: resolves a tool name to the server that
 * owns it and forwards the call. Never throws; every failure comes back as a
 * structured `DispatchResult`.
 *
 * Calls are independent of each other. Nothing here serializes them; the
 * owning transport correlates responses by request id.
 */
@injectable()
export class Dispatcher implements IDispatcher {
  constructor(
    @inject(TYPES.ToolCatalog) private catalog: IToolCatalog,
    @inject(TYPES.LifecycleManager) private transports: ITransportRegistry,
    @inject(TYPES.GatewayConfig) private config: GatewayConfig,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async call(
    toolName: string,
    args: Record<string, unknown> = {},
    timeoutMs: number = this.config.settings.callTimeoutMs,
  ): Promise<DispatchResult> {
    const serverName = this.catalog.lookup(toolName);
    if (serverName === undefined) {
      const error = new ToolNotFoundError(
        toolName,
        this.catalog.list().map((tool) => tool.name),
      );
      this.logger.info(error.message);
      return { ok: false, toolName, error: error.toPayload() };
    }

    const transport = this.transports.getTransport(serverName);
    if (!transport) {
      const error = new TransportDisconnected(serverName, "no live transport");
      this.logger.error(`Cannot call '${toolName}'`, error);
      return { ok: false, toolName, serverName, error: error.toPayload() };
    }

    this.logger.debug(`Calling '${toolName}' on server '${serverName}'`);
    const startedAt = Date.now();

    try {
      const result = await transport.invoke(toolName, args, timeoutMs);
      this.logger.debug(
        `Call to '${toolName}' on '${serverName}' finished in ${Date.now() - startedAt}ms`,
      );
      return { ok: true, toolName, serverName, result };
    } catch (error) {
      const gatewayError = toGatewayError(error, serverName);
      this.logger.error(`Call to '${toolName}' failed`, gatewayError);
      return {
        ok: false,
        toolName,
        serverName,
        error: gatewayError.toPayload(),
      };
    }
  }
}

/**
 * Render a dispatch outcome as an MCP tool result. A failure is marked
 * `isError` and names its kind, so it never reads as an empty success.
 */
export function toCallToolResult(outcome: DispatchResult): CallToolResult {
  if (outcome.ok) {
    return outcome.result;
  }
  return {
    content: [
      {
        type: "text",
        text: `[${outcome.error.kind}] ${outcome.error.message}`,
      },
    ],
    isError: true,
  };
}
