import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import type { GatewayErrorKind } from "../utils/gateway-errors.js";

export type ServerKind = "process" | "stream";

interface ServerDescriptorBase {
  readonly name: string;
  readonly allowedTools?: readonly string[];
}

export interface ProcessServerDescriptor extends ServerDescriptorBase {
  readonly kind: "process";
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export interface StreamServerDescriptor extends ServerDescriptorBase {
  readonly kind: "stream";
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

export type ServerDescriptor = ProcessServerDescriptor | StreamServerDescriptor;

export interface ReconnectSettings {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface GatewaySettings {
  handshakeTimeoutMs: number;
  callTimeoutMs: number;
  shutdownGraceMs: number;
  logLevel: LogLevel;
  reconnect: ReconnectSettings;
}

export interface GatewayConfig {
  configPath?: string;
  settings: GatewaySettings;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Tool["inputSchema"];
  /** Name of the server that advertised this tool. */
  owner: string;
}

export type TransportState =
  | "disconnected"
  | "starting"
  | "ready"
  | "degraded"
  | "closed";

export type Unsubscribe = () => void;

/**
 * One connection to one tool server. Implemented by the process (stdio)
 * and stream (HTTP+SSE) variants.
 */
export interface ITransport {
  readonly serverName: string;
  readonly kind: ServerKind;
  readonly state: TransportState;
  start(): Promise<void>;
  listTools(timeoutMs?: number): Promise<ToolDescriptor[]>;
  invoke(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult>;
  stop(): Promise<void>;
  onDisconnect(handler: (error: Error) => void): Unsubscribe;
  onReconnect(handler: () => void): Unsubscribe;
  onToolListChanged(handler: () => void): Unsubscribe;
}

export interface ITransportFactory {
  create(descriptor: ServerDescriptor): ITransport;
}

export interface ITransportRegistry {
  getTransport(serverName: string): ITransport | undefined;
}

export interface RegistrationSummary {
  added: string[];
  removed: string[];
  overridden: Array<{ tool: string; previousOwner: string }>;
  changed: boolean;
}

export interface IToolCatalog {
  register(serverName: string, tools: ToolDescriptor[]): RegistrationSummary;
  unregister(serverName: string): string[];
  lookup(toolName: string): string | undefined;
  get(toolName: string): ToolDescriptor | undefined;
  list(): ToolDescriptor[];
  snapshot(): ReadonlyMap<string, ToolDescriptor>;
  toolsOwnedBy(serverName: string): string[];
  onChange(listener: () => void): Unsubscribe;
}

export interface ServerStatus {
  name: string;
  kind: ServerKind;
  state: TransportState;
  toolCount: number;
  lastError?: string;
}

export interface StartupReport {
  started: string[];
  failed: Array<{ serverName: string; error: Error }>;
}

export interface ILifecycleManager extends ITransportRegistry {
  startAll(): Promise<StartupReport>;
  refresh(serverName: string): Promise<void>;
  status(): ServerStatus[];
  shutdown(): Promise<void>;
}

export interface ToolErrorPayload {
  kind: GatewayErrorKind;
  message: string;
}

export type DispatchResult =
  | {
      ok: true;
      toolName: string;
      serverName: string;
      result: CallToolResult;
    }
  | {
      ok: false;
      toolName: string;
      serverName?: string;
      error: ToolErrorPayload;
    };

export interface IDispatcher {
  call(
    toolName: string,
    args?: Record<string, unknown>,
    timeoutMs?: number,
  ): Promise<DispatchResult>;
}

export interface IShutdownHandler {
  shutdown(): Promise<void>;
}

export interface ILogger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, error?: unknown): void;
  debug(message: string, meta?: unknown): void;
}
