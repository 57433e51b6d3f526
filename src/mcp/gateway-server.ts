import { injectable, inject } from "inversify";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {
  IDispatcher,
  ILogger,
  IToolCatalog,
  Unsubscribe,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import { toCallToolResult } from "../services/dispatcher.js";
import { CLIENT_INFO } from "./base-transport.js";

/**
 * Front-facing MCP server. The orchestrator connects here and sees one flat
 * tool list: whatever the catalog holds right now.
 *
 * - tools/list answers from the catalog
 * - tools/call goes through the dispatcher; a failure comes back as an
 *   `isError` result naming its kind
 * - every catalog change is announced with notifications/tools/list_changed
 */
@injectable()
export class GatewayServer {
  private server: Server;
  private connected = false;
  private unsubscribe: Unsubscribe;

  constructor(
    @inject(TYPES.ToolCatalog) private catalog: IToolCatalog,
    @inject(TYPES.Dispatcher) private dispatcher: IDispatcher,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.server = new Server(
      { name: CLIENT_INFO.name, version: CLIENT_INFO.version },
      {
        capabilities: {
          tools: {
            listChanged: true,
          },
        },
      },
    );

    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const outcome = await this.dispatcher.call(
        request.params.name,
        request.params.arguments ?? {},
      );
      return toCallToolResult(outcome);
    });

    this.unsubscribe = this.catalog.onChange(() => this.announceToolListChanged());
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
    this.connected = true;
    this.logger.info(
      `Gateway serving ${this.catalog.list().length} tools over MCP`,
    );
  }

  async close(): Promise<void> {
    this.unsubscribe();
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.server.close();
  }

  getServer(): Server {
    return this.server;
  }

  private listTools(): Tool[] {
    return this.catalog.list().map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  private announceToolListChanged(): void {
    if (!this.connected) {
      return;
    }
    this.server.sendToolListChanged().catch((error: unknown) => {
      this.logger.error("Failed to send tools/list_changed", error);
    });
  }
}
