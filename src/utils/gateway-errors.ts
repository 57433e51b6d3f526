import type { ToolErrorPayload } from "../types/interfaces.js";

export type GatewayErrorKind =
  | "config_error"
  | "transport_startup_error"
  | "protocol_error"
  | "tool_not_found"
  | "tool_invocation_timeout"
  | "transport_disconnected"
  | "remote_error";

/**
 * Base class for every failure the gateway reports. The `kind` is what the
 * orchestrator sees; the class is what the code matches on.
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(
    message: string,
    readonly serverName?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toPayload(): ToolErrorPayload {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * One or more server descriptors (or gateway settings) are invalid.
 * Carries every violation found, not just the first.
 */
export class ConfigError extends GatewayError {
  readonly kind = "config_error";

  constructor(readonly violations: string[]) {
    super(
      violations.length === 1
        ? `Invalid configuration: ${violations[0]}`
        : `Invalid configuration (${violations.length} problems):\n  - ${violations.join("\n  - ")}`,
    );
  }
}

export class TransportStartupError extends GatewayError {
  readonly kind = "transport_startup_error";

  constructor(serverName: string, reason: string, options?: { cause?: unknown }) {
    super(`Server '${serverName}' failed to start: ${reason}`, serverName, options);
  }
}

export class ProtocolError extends GatewayError {
  readonly kind = "protocol_error";

  constructor(serverName: string | undefined, reason: string) {
    super(
      serverName
        ? `Malformed message from server '${serverName}': ${reason}`
        : `Malformed message: ${reason}`,
      serverName,
    );
  }
}

export class ToolNotFoundError extends GatewayError {
  readonly kind = "tool_not_found";

  constructor(
    readonly toolName: string,
    available: readonly string[] = [],
  ) {
    const availableList =
      available.length > 0 ? available.join(", ") : "none";
    super(
      `Tool '${toolName}' is not registered. Available tools: ${availableList}`,
    );
  }
}

export class ToolInvocationTimeout extends GatewayError {
  readonly kind = "tool_invocation_timeout";

  constructor(
    serverName: string,
    readonly toolName: string,
    readonly timeoutMs: number,
  ) {
    super(
      `Call to '${toolName}' on server '${serverName}' timed out after ${timeoutMs}ms`,
      serverName,
    );
  }
}

export class TransportDisconnected extends GatewayError {
  readonly kind = "transport_disconnected";

  constructor(serverName: string, reason: string) {
    super(`Server '${serverName}' is disconnected: ${reason}`, serverName);
  }
}

/** The server answered with a JSON-RPC error object. */
export class RemoteToolError extends GatewayError {
  readonly kind = "remote_error";

  constructor(
    serverName: string,
    readonly code: number,
    remoteMessage: string,
    readonly data?: unknown,
  ) {
    super(
      `Server '${serverName}' returned error ${code}: ${remoteMessage}`,
      serverName,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown below the Dispatcher into the gateway taxonomy.
 */
export function toGatewayError(
  error: unknown,
  serverName?: string,
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new ProtocolError(serverName, errorMessage(error));
}
