import { vi } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type {
  ITransport,
  ServerKind,
  ToolDescriptor,
  TransportState,
  Unsubscribe,
} from "../types/interfaces.js";

export function tool(
  name: string,
  owner: string,
  description?: string,
): ToolDescriptor {
  return { name, description, inputSchema: { type: "object" }, owner };
}

/**
 * Scripted ITransport for service tests. Every method is a vi.fn so tests
 * can swap behavior per call; state changes only when a test drives them.
 */
export class FakeTransport implements ITransport {
  state: TransportState = "disconnected";
  tools: string[];
  startDelayMs = 0;
  startError: Error | undefined;

  private disconnectHandlers = new Set<(error: Error) => void>();
  private reconnectHandlers = new Set<() => void>();
  private toolListChangedHandlers = new Set<() => void>();

  constructor(
    readonly serverName: string,
    tools: string[] = [],
    readonly kind: ServerKind = "process",
    private stopLog?: string[],
  ) {
    this.tools = tools;
  }

  readonly start = vi.fn(async (): Promise<void> => {
    this.state = "starting";
    if (this.startDelayMs > 0) {
      await sleep(this.startDelayMs);
    }
    if (this.startError) {
      this.state = "closed";
      throw this.startError;
    }
    this.state = "ready";
  });

  readonly listTools = vi.fn(
    async (): Promise<ToolDescriptor[]> =>
      this.tools.map((name) => tool(name, this.serverName)),
  );

  readonly invoke = vi.fn(
    async (
      toolName: string,
      args: Record<string, unknown>,
    ): Promise<CallToolResult> => ({
      content: [
        {
          type: "text",
          text: `${this.serverName}/${toolName} ${JSON.stringify(args)}`,
        },
      ],
    }),
  );

  readonly stop = vi.fn(async (): Promise<void> => {
    this.stopLog?.push(this.serverName);
    this.state = "closed";
  });

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

  /** Simulate losing the connection, ending in `state`. */
  disconnect(error: Error, state: "degraded" | "closed"): void {
    this.state = state;
    for (const handler of this.disconnectHandlers) {
      handler(error);
    }
  }

  reconnect(): void {
    this.state = "ready";
    for (const handler of this.reconnectHandlers) {
      handler();
    }
  }

  toolListChanged(): void {
    for (const handler of this.toolListChangedHandlers) {
      handler();
    }
  }

  get listenerCount(): number {
    return (
      this.disconnectHandlers.size +
      this.reconnectHandlers.size +
      this.toolListChangedHandlers.size
    );
  }
}
