import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { ChildProcess } from "node:child_process";
import {
  ReadableStream,
  type ReadableStreamDefaultController,
} from "node:stream/web";
import type { ProcessSpawner } from "./process-transport.js";
import type { FetchLike } from "./stream-transport.js";

export interface FakeTool {
  name: string;
  description?: string;
  inputSchema: { type: "object"; properties?: Record<string, object> };
}

export interface ReceivedFrame {
  id?: number | string;
  method?: string;
  params?: Record<string, unknown>;
  result?: unknown;
  error?: { code: number; message: string };
}

type Reply = { result: Record<string, unknown> } | { error: { code: number; message: string } };

/**
 * Minimal in-process MCP server. Answers initialize, tools/list and
 * tools/call; anything can be overridden per method or held back so a test
 * decides when (and whether) it is answered.
 */
export class FakeMcpServer {
  tools: FakeTool[] = [];
  /** Page size for tools/list; 0 means everything in one page. */
  pageSize = 0;
  received: ReceivedFrame[] = [];
  held: ReceivedFrame[] = [];
  send: (frame: Record<string, unknown>) => void = () => {};

  private holding = new Set<string>();
  private overrides = new Map<string, (params: Record<string, unknown>) => Reply>();

  callTool: (name: string, args: Record<string, unknown>) => Record<string, unknown> = (
    name,
    args,
  ) => ({
    content: [{ type: "text", text: `${name}:${JSON.stringify(args)}` }],
  });

  /** Leave requests for a method unanswered; they collect in `held`. */
  hold(method: string): void {
    this.holding.add(method);
  }

  override(method: string, reply: (params: Record<string, unknown>) => Reply): void {
    this.overrides.set(method, reply);
  }

  /** Answer a held request with a result. */
  respond(id: number | string | undefined, result: Record<string, unknown>): void {
    this.send({ jsonrpc: "2.0", id, result });
  }

  /** Send a raw message, bypassing JSON encoding. */
  sendRaw: (raw: string) => void = () => {};

  notify(method: string): void {
    this.send({ jsonrpc: "2.0", method });
  }

  requestsFor(method: string): ReceivedFrame[] {
    return this.received.filter((frame) => frame.method === method && frame.id !== undefined);
  }

  handle(raw: string): void {
    const frame: ReceivedFrame = JSON.parse(raw);
    this.received.push(frame);
    if (frame.method === undefined || frame.id === undefined) {
      return;
    }
    if (this.holding.has(frame.method)) {
      this.held.push(frame);
      return;
    }
    const reply = this.reply(frame.method, frame.params ?? {});
    this.send({ jsonrpc: "2.0", id: frame.id, ...reply });
  }

  private reply(method: string, params: Record<string, unknown>): Reply {
    const override = this.overrides.get(method);
    if (override) {
      return override(params);
    }
    switch (method) {
      case "initialize":
        return {
          result: {
            protocolVersion: String(params.protocolVersion),
            capabilities: { tools: { listChanged: true } },
            serverInfo: { name: "fake-server", version: "1.0.0" },
          },
        };
      case "tools/list":
        return { result: this.listPage(params.cursor) };
      case "tools/call": {
        const name = typeof params.name === "string" ? params.name : "";
        const args =
          typeof params.arguments === "object" && params.arguments !== null
            ? Object.fromEntries(Object.entries(params.arguments))
            : {};
        return { result: this.callTool(name, args) };
      }
      default:
        return { error: { code: -32601, message: `Unknown method ${method}` } };
    }
  }

  private listPage(cursor: unknown): Record<string, unknown> {
    if (this.pageSize <= 0) {
      return { tools: this.tools };
    }
    const start = typeof cursor === "string" ? Number(cursor) : 0;
    const end = start + this.pageSize;
    const page: Record<string, unknown> = { tools: this.tools.slice(start, end) };
    if (end < this.tools.length) {
      page.nextCursor = String(end);
    }
    return page;
  }
}

/**
 * Stands in for a spawned child: three PassThrough pipes plus exit and close
 * events.
 * SIGTERM ends it unless `ignoreSigterm` is set; SIGKILL always does.
 */
export class FakeChildProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly signals: string[] = [];
  ignoreSigterm = false;
  exited = false;

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.ignoreSigterm) {
      return true;
    }
    this.exit(null, signal);
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    process.nextTick(() => {
      this.emit("exit", code, signal);
      // "close" follows once whatever was written to stdout is delivered.
      setImmediate(() => this.emit("close", code, signal));
    });
  }
}

export interface SpawnCall {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv | undefined;
  shell: boolean | string | undefined;
}

/** Spawner whose children are wired to a FakeMcpServer over line-delimited JSON. */
export function createFakeSpawner(server: FakeMcpServer): {
  spawner: ProcessSpawner;
  children: FakeChildProcess[];
  calls: SpawnCall[];
} {
  const children: FakeChildProcess[] = [];
  const calls: SpawnCall[] = [];

  const spawner: ProcessSpawner = (command, args, options) => {
    const child = new FakeChildProcess();
    children.push(child);
    calls.push({ command, args, env: options.env, shell: options.shell });

    let buffered = "";
    child.stdin.on("data", (chunk: Buffer) => {
      buffered += chunk.toString("utf8");
      let index = buffered.indexOf("\n");
      while (index !== -1) {
        const line = buffered.slice(0, index);
        buffered = buffered.slice(index + 1);
        if (line.length > 0) {
          server.handle(line);
        }
        index = buffered.indexOf("\n");
      }
    });

    server.send = (frame) => {
      if (!child.exited) {
        child.stdout.write(`${JSON.stringify(frame)}\n`);
      }
    };
    server.sendRaw = (raw) => {
      child.stdout.write(`${raw}\n`);
    };

    return child as unknown as ChildProcess;
  };

  return { spawner, children, calls };
}

interface OpenStream {
  controller: ReadableStreamDefaultController<Uint8Array>;
  closed: boolean;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * `fetch` stand-in for a legacy HTTP+SSE MCP server: GET opens an event
 * stream that starts with an `endpoint` event, POSTs to that endpoint are fed
 * to the FakeMcpServer and its replies come back as `message` events.
 */
export class FakeSseServer {
  readonly requests: RecordedRequest[] = [];
  /** Status codes for the next GETs; an empty queue means 200. */
  readonly getStatuses: number[] = [];
  /** Status codes for the next POSTs; an empty queue means 202. */
  readonly postStatuses: number[] = [];
  endpoint = "/messages?sessionId=session-1";
  sendEndpoint = true;

  private streams: OpenStream[] = [];
  private encoder = new TextEncoder();

  constructor(readonly server: FakeMcpServer) {
    server.send = (frame) => this.emitEvent("message", JSON.stringify(frame));
    server.sendRaw = (raw) => this.emitEvent("message", raw);
  }

  get streamCount(): number {
    return this.streams.length;
  }

  get openStreams(): number {
    return this.streams.filter((stream) => !stream.closed).length;
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    const method = init?.method ?? "GET";
    const headers = Object.fromEntries(new Headers(init?.headers).entries());
    const body = typeof init?.body === "string" ? init.body : undefined;
    this.requests.push({ method, url, headers, body });

    if (method === "POST") {
      const status = this.postStatuses.shift() ?? 202;
      if (status < 300 && body !== undefined) {
        this.server.handle(body);
      }
      return new Response(null, { status });
    }

    const status = this.getStatuses.shift() ?? 200;
    if (status >= 300) {
      return new Response("unavailable", { status });
    }
    return new Response(this.openStream(init?.signal ?? undefined), {
      status,
      headers: { "content-type": "text/event-stream" },
    });
  };

  /** End the newest event stream as if the server went away. */
  dropStream(): void {
    const stream = this.streams[this.streams.length - 1];
    if (stream && !stream.closed) {
      stream.closed = true;
      stream.controller.close();
    }
  }

  emitEvent(event: string, data: string): void {
    const stream = this.streams[this.streams.length - 1];
    if (!stream || stream.closed) {
      return;
    }
    stream.controller.enqueue(this.encoder.encode(`event: ${event}\ndata: ${data}\n\n`));
  }

  private openStream(signal: AbortSignal | undefined): ReadableStream<Uint8Array> {
    let opened: OpenStream | undefined;
    return new ReadableStream<Uint8Array>({
      start: (controller) => {
        const stream: OpenStream = { controller, closed: false };
        opened = stream;
        this.streams.push(stream);
        if (this.sendEndpoint) {
          controller.enqueue(
            this.encoder.encode(`event: endpoint\ndata: ${this.endpoint}\n\n`),
          );
        }
        signal?.addEventListener("abort", () => {
          if (!stream.closed) {
            stream.closed = true;
            controller.error(new Error("aborted"));
          }
        });
      },
      cancel: () => {
        if (opened) {
          opened.closed = true;
        }
      },
    });
  }
}
