import {
  CallToolResultSchema,
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  ListToolsResultSchema,
  type CallToolResult,
  type Implementation,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {
  ILogger,
  ITransport,
  ReconnectSettings,
  ServerDescriptor,
  ServerKind,
  ToolDescriptor,
  TransportState,
  Unsubscribe,
} from "../types/interfaces.js";
import {
  GatewayError,
  ProtocolError,
  ToolInvocationTimeout,
  TransportDisconnected,
  TransportStartupError,
  errorMessage,
} from "../utils/gateway-errors.js";
import {
  JSONRPC_VERSION,
  METHOD_NOT_FOUND,
  METHODS,
  decodeFrame,
  type IncomingRequest,
  type OutboundFrame,
} from "./message-framing.js";
import { PendingCallTable } from "./pending-calls.js";

export const CLIENT_INFO = {
  name: "mcp-tool-gateway",
  version: "0.1.0",
} as const;

export interface TransportOptions {
  handshakeTimeoutMs: number;
  /** Default deadline for `listTools` when the caller passes none. */
  requestTimeoutMs: number;
  shutdownGraceMs: number;
  reconnect: ReconnectSettings;
}

const ALLOWED_TRANSITIONS: Record<TransportState, readonly TransportState[]> = {
  disconnected: ["starting", "closed"],
  starting: ["ready", "closed"],
  ready: ["degraded", "closed"],
  degraded: ["ready", "closed"],
  closed: [],
};

/**
 * Shared mechanics of both transport variants: the state machine, request
 * correlation, the handshake, and the tools/list and tools/call exchanges.
 * Subclasses own the channel and decide how frames travel.
 */
export abstract class BaseTransport implements ITransport {
  abstract readonly kind: ServerKind;

  protected readonly pending: PendingCallTable;
  private currentState: TransportState = "disconnected";
  private remoteInfo: Implementation | undefined;

  private disconnectHandlers = new Set<(error: Error) => void>();
  private reconnectHandlers = new Set<() => void>();
  private toolListChangedHandlers = new Set<() => void>();

  protected constructor(
    protected readonly descriptor: ServerDescriptor,
    protected readonly options: TransportOptions,
    protected readonly logger: ILogger,
  ) {
    this.pending = new PendingCallTable(descriptor.name);
  }

  get serverName(): string {
    return this.descriptor.name;
  }

  get state(): TransportState {
    return this.currentState;
  }

  /** Name and version the server reported during the handshake. */
  get serverInfo(): Implementation | undefined {
    return this.remoteInfo;
  }

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;

  /**
   * Put one frame on the wire. Rejects when the channel is gone or the send
   * takes longer than `timeoutMs`.
   */
  protected abstract sendFrame(
    frame: OutboundFrame,
    timeoutMs: number,
  ): Promise<void>;

  async listTools(
    timeoutMs: number = this.options.requestTimeoutMs,
  ): Promise<ToolDescriptor[]> {
    this.assertReady();

    const tools: Tool[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    do {
      const result = await this.exchange(
        METHODS.listTools,
        cursor !== undefined ? { cursor } : {},
        timeoutMs,
        () =>
          new ToolInvocationTimeout(this.serverName, METHODS.listTools, timeoutMs),
      );
      const page = ListToolsResultSchema.safeParse(result);
      if (!page.success) {
        throw new ProtocolError(
          this.serverName,
          `invalid ${METHODS.listTools} result: ${page.error.message}`,
        );
      }
      tools.push(...page.data.tools);

      cursor = page.data.nextCursor;
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) {
          throw new ProtocolError(
            this.serverName,
            `${METHODS.listTools} returned cursor '${cursor}' twice`,
          );
        }
        seenCursors.add(cursor);
      }
    } while (cursor !== undefined);

    return this.applyToolFilter(tools).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      owner: this.serverName,
    }));
  }

  async invoke(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult> {
    this.assertReady();

    const result = await this.exchange(
      METHODS.invokeTool,
      { name: toolName, arguments: args },
      timeoutMs,
      () => new ToolInvocationTimeout(this.serverName, toolName, timeoutMs),
    );
    const parsed = CallToolResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ProtocolError(
        this.serverName,
        `invalid ${METHODS.invokeTool} result for '${toolName}': ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  onDisconnect(handler: (error: Error) => void): Unsubscribe {
    this.disconnectHandlers.add(handler);
    return () => this.disconnectHandlers.delete(handler);
  }

  onReconnect(handler: () => void): Unsubscribe {
    this.reconnectHandlers.add(handler);
    return () => this.reconnectHandlers.delete(handler);
  }

  onToolListChanged(handler: () => void): Unsubscribe {
    this.toolListChangedHandlers.add(handler);
    return () => this.toolListChangedHandlers.delete(handler);
  }

  /**
   * Move the state machine. Returns false (and changes nothing) for a
   * transition the machine does not allow, which includes leaving Closed.
   */
  protected transition(next: TransportState): boolean {
    const previous = this.currentState;
    if (previous === next) {
      return true;
    }
    if (!ALLOWED_TRANSITIONS[previous].includes(next)) {
      this.logger.debug(
        `Server '${this.serverName}': ignoring transition ${previous} -> ${next}`,
      );
      return false;
    }
    this.currentState = next;
    this.logger.debug(
      `Server '${this.serverName}': ${previous} -> ${next}`,
    );
    return true;
  }

  /** initialize / initialized exchange that confirms the server is responsive. */
  protected async handshake(): Promise<void> {
    const timeoutMs = this.options.handshakeTimeoutMs;
    const result = await this.exchange(
      METHODS.handshake,
      {
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: CLIENT_INFO,
      },
      timeoutMs,
      () =>
        new TransportStartupError(
          this.serverName,
          `no handshake response within ${timeoutMs}ms`,
        ),
    );

    const parsed = InitializeResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ProtocolError(
        this.serverName,
        `invalid ${METHODS.handshake} result: ${parsed.error.message}`,
      );
    }
    this.remoteInfo = parsed.data.serverInfo;

    await this.sendFrame(
      {
        jsonrpc: JSONRPC_VERSION,
        method: METHODS.initialized,
      },
      timeoutMs,
    );

    this.logger.debug(
      `Server '${this.serverName}': handshake complete (${parsed.data.serverInfo.name} ${parsed.data.serverInfo.version}, protocol ${parsed.data.protocolVersion})`,
    );
  }

  /** Route one raw message received from the server. */
  protected handleInbound(raw: string): void {
    const inbound = decodeFrame(raw);

    switch (inbound.type) {
      case "response":
        if (!this.pending.settle(inbound.frame)) {
          this.logger.debug(
            `Server '${this.serverName}': discarding response for unknown or expired request ${inbound.frame.id}`,
          );
        }
        return;

      case "malformed": {
        const error = new ProtocolError(this.serverName, inbound.reason);
        if (typeof inbound.id === "number" && this.pending.fail(inbound.id, error)) {
          return;
        }
        this.logger.error(
          `Server '${this.serverName}': dropping malformed message`,
          error,
        );
        return;
      }

      case "notification":
        if (inbound.method === METHODS.toolListChanged) {
          this.logger.info(
            `Server '${this.serverName}': tool list changed`,
          );
          this.notify(this.toolListChangedHandlers, "tool list changed");
        }
        return;

      case "request":
        this.answerServerRequest(inbound.frame);
        return;
    }
  }

  /** Fail every in-flight call with the same error. */
  protected failPending(error: Error): void {
    const outstanding = this.pending.outstanding();
    if (outstanding.length === 0) {
      return;
    }
    this.pending.failAll(error);
    this.logger.debug(
      `Server '${this.serverName}': failed ${outstanding.length} in-flight request(s): ${outstanding
        .map((call) => `${call.method}#${call.id}`)
        .join(", ")}`,
    );
  }

  protected emitDisconnect(error: Error): void {
    for (const handler of Array.from(this.disconnectHandlers)) {
      try {
        handler(error);
      } catch (handlerError) {
        this.logger.error(
          `Server '${this.serverName}': disconnect handler failed`,
          handlerError,
        );
      }
    }
  }

  protected emitReconnect(): void {
    this.notify(this.reconnectHandlers, "reconnect");
  }

  protected disconnected(reason: string): TransportDisconnected {
    return new TransportDisconnected(this.serverName, reason);
  }

  private async exchange(
    method: string,
    params: Record<string, unknown>,
    timeoutMs: number,
    onTimeout: () => Error,
  ): Promise<Record<string, unknown>> {
    const { id, result } = this.pending.create({ method, timeoutMs, onTimeout });

    // The reply can arrive before the send settles; only a failed send
    // affects the call, and the call's own deadline still applies.
    void this.sendFrame({ jsonrpc: JSONRPC_VERSION, id, method, params }, timeoutMs).catch(
      (error: unknown) => {
        this.pending.fail(
          id,
          error instanceof GatewayError
            ? error
            : this.disconnected(`failed to send ${method}: ${errorMessage(error)}`),
        );
      },
    );

    return result;
  }

  private answerServerRequest(request: IncomingRequest): void {
    const response: OutboundFrame =
      request.method === METHODS.ping
        ? { jsonrpc: JSONRPC_VERSION, id: request.id, result: {} }
        : {
            jsonrpc: JSONRPC_VERSION,
            id: request.id,
            error: {
              code: METHOD_NOT_FOUND,
              message: `Method not supported by gateway: ${request.method}`,
            },
          };

    void this.sendFrame(response, this.options.requestTimeoutMs).catch((error: unknown) => {
      this.logger.debug(
        `Server '${this.serverName}': could not answer ${request.method}: ${errorMessage(error)}`,
      );
    });
  }

  private applyToolFilter(tools: Tool[]): Tool[] {
    const allowedTools = this.descriptor.allowedTools;
    if (allowedTools === undefined) {
      return tools;
    }

    if (allowedTools.length === 0) {
      this.logger.info(
        `Server '${this.serverName}': All tools blocked by empty allowedTools array`,
      );
      return [];
    }

    const allowedSet = new Set(allowedTools);
    const filteredTools = tools.filter((tool) => allowedSet.has(tool.name));

    const actualToolNames = new Set(tools.map((tool) => tool.name));
    for (const allowedTool of allowedTools) {
      if (!actualToolNames.has(allowedTool)) {
        this.logger.error(
          `Server '${this.serverName}': Tool '${allowedTool}' in allowedTools not found. Available: ${Array.from(actualToolNames).join(", ")}`,
        );
      }
    }

    this.logger.info(
      `Server '${this.serverName}': Filtered to ${filteredTools.length} of ${tools.length} tools: ${filteredTools.map((tool) => tool.name).join(", ")}`,
    );
    return filteredTools;
  }

  private assertReady(): void {
    if (this.currentState !== "ready") {
      throw this.disconnected(`transport is ${this.currentState}`);
    }
  }

  private notify(handlers: Set<() => void>, event: string): void {
    for (const handler of Array.from(handlers)) {
      try {
        handler();
      } catch (error) {
        this.logger.error(
          `Server '${this.serverName}': ${event} handler failed`,
          error,
        );
      }
    }
  }
}
