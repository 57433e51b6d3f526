import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProcessTransport } from "./process-transport.js";
import type { TransportOptions } from "./base-transport.js";
import {
  FakeMcpServer,
  createFakeSpawner,
  type FakeChildProcess,
  type SpawnCall,
} from "./fake-servers.test-helper.js";
import type { ProcessSpawner } from "./process-transport.js";
import type { ILogger, ProcessServerDescriptor } from "../types/interfaces.js";
import {
  ProtocolError,
  RemoteToolError,
  ToolInvocationTimeout,
  TransportDisconnected,
  TransportStartupError,
} from "../utils/gateway-errors.js";

// Mock logger
const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

const options: TransportOptions = {
  handshakeTimeoutMs: 500,
  requestTimeoutMs: 500,
  shutdownGraceMs: 50,
  reconnect: {
    maxAttempts: 1,
    initialDelayMs: 10,
    maxDelayMs: 10,
    backoffMultiplier: 2,
  },
};

const descriptor: ProcessServerDescriptor = {
  name: "files",
  kind: "process",
  command: "files-server",
  args: ["--stdio"],
  env: { API_TOKEN: "test-token" },
};

describe("ProcessTransport", () => {
  let logger: ILogger;
  let server: FakeMcpServer;
  let spawner: ProcessSpawner;
  let children: FakeChildProcess[];
  let calls: SpawnCall[];
  let transport: ProcessTransport;

  const createTransport = (
    overrides: Partial<ProcessServerDescriptor> = {},
    transportOptions: TransportOptions = options,
  ) =>
    new ProcessTransport(
      { ...descriptor, ...overrides },
      transportOptions,
      logger,
      spawner,
    );

  beforeEach(() => {
    logger = createMockLogger();
    server = new FakeMcpServer();
    server.tools = [
      { name: "read", description: "Read a file", inputSchema: { type: "object" } },
      { name: "write", inputSchema: { type: "object" } },
    ];
    ({ spawner, children, calls } = createFakeSpawner(server));
    transport = createTransport();
  });

  afterEach(async () => {
    await transport.stop();
  });

  describe("start", () => {
    it("should spawn the command and complete the handshake", async () => {
      await transport.start();

      expect(transport.state).toBe("ready");
      expect(calls).toEqual([
        {
          command: "files-server",
          args: ["--stdio"],
          env: expect.objectContaining({ API_TOKEN: "test-token" }),
          shell: false,
        },
      ]);
      expect(transport.serverInfo).toEqual({
        name: "fake-server",
        version: "1.0.0",
      });
      expect(server.received[0]).toMatchObject({
        id: 1,
        method: "initialize",
        params: { clientInfo: { name: "mcp-tool-gateway", version: "0.1.0" } },
      });
      await vi.waitFor(() =>
        expect(server.received.map((frame) => frame.method)).toEqual([
          "initialize",
          "notifications/initialized",
        ]),
      );
    });

    it("should fail with the stderr tail when the process exits during the handshake", async () => {
      server.hold("initialize");
      const failure = transport.start().catch((error: unknown) => error);

      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      children[0].stderr.write("fatal: missing token\n");
      await vi.waitFor(() =>
        expect(transport.recentStderr).toEqual(["fatal: missing token"]),
      );
      children[0].exit(2);

      const error = await failure;
      expect(error).toBeInstanceOf(TransportStartupError);
      expect(error).toMatchObject({
        message:
          "Server 'files' failed to start: Server 'files' is disconnected: process exited with code 2 (stderr: fatal: missing token)",
      });
      expect(transport.state).toBe("closed");
    });

    it("should kill the process when the handshake times out", async () => {
      transport = createTransport({}, { ...options, handshakeTimeoutMs: 30 });
      server.hold("initialize");

      await expect(transport.start()).rejects.toThrow(
        "Server 'files' failed to start: no handshake response within 30ms",
      );

      expect(children[0].signals).toEqual(["SIGTERM"]);
      expect(children[0].stdin.writableEnded).toBe(true);
      expect(transport.state).toBe("closed");
    });

    it("should refuse to start twice", async () => {
      await transport.start();

      await expect(transport.start()).rejects.toThrow(
        "Server 'files' failed to start: cannot start a transport that is ready",
      );
      expect(children).toHaveLength(1);
    });
  });

  describe("listTools", () => {
    it("should return the advertised tools with their owner", async () => {
      await transport.start();

      const tools = await transport.listTools();

      expect(tools).toEqual([
        {
          name: "read",
          description: "Read a file",
          inputSchema: { type: "object" },
          owner: "files",
        },
        {
          name: "write",
          description: undefined,
          inputSchema: { type: "object" },
          owner: "files",
        },
      ]);
    });

    it("should follow pagination cursors", async () => {
      server.pageSize = 1;
      await transport.start();

      const tools = await transport.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(["read", "write"]);
      const requests = server.requestsFor("tools/list");
      expect(requests).toHaveLength(2);
      expect(requests[0].params).toEqual({});
      expect(requests[1].params).toEqual({ cursor: "1" });
    });

    it("should keep only allowed tools and report missing ones", async () => {
      transport = createTransport({ allowedTools: ["read", "missing"] });
      await transport.start();

      const tools = await transport.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(["read"]);
      expect(logger.error).toHaveBeenCalledWith(
        "Server 'files': Tool 'missing' in allowedTools not found. Available: read, write",
      );
    });

    it("should return nothing for an empty allowedTools list", async () => {
      transport = createTransport({ allowedTools: [] });
      await transport.start();

      expect(await transport.listTools()).toEqual([]);
    });

    it("should fail before the transport is ready", async () => {
      await expect(transport.listTools()).rejects.toThrow(
        "Server 'files' is disconnected: transport is disconnected",
      );
      expect(children).toHaveLength(0);
    });
  });

  describe("invoke", () => {
    it("should forward the call and return the result", async () => {
      await transport.start();

      const result = await transport.invoke("read", { path: "/a" }, 500);

      expect(result).toEqual({
        content: [{ type: "text", text: 'read:{"path":"/a"}' }],
      });
      expect(server.requestsFor("tools/call")[0].params).toEqual({
        name: "read",
        arguments: { path: "/a" },
      });
    });

    it("should match responses to calls by id when they arrive out of order", async () => {
      await transport.start();
      server.hold("tools/call");

      const first = transport.invoke("read", {}, 500);
      const second = transport.invoke("write", {}, 500);
      await vi.waitFor(() => expect(server.held).toHaveLength(2));

      server.respond(server.held[1].id, {
        content: [{ type: "text", text: "second" }],
      });
      server.respond(server.held[0].id, {
        content: [{ type: "text", text: "first" }],
      });

      await expect(first).resolves.toEqual({
        content: [{ type: "text", text: "first" }],
      });
      await expect(second).resolves.toEqual({
        content: [{ type: "text", text: "second" }],
      });
    });

    it("should time out and discard the late response", async () => {
      await transport.start();
      server.hold("tools/call");

      await expect(transport.invoke("read", {}, 30)).rejects.toThrow(
        new ToolInvocationTimeout("files", "read", 30),
      );

      server.respond(server.held[0].id, { content: [] });
      await vi.waitFor(() =>
        expect(logger.debug).toHaveBeenCalledWith(
          "Server 'files': discarding response for unknown or expired request 2",
        ),
      );
      expect(transport.state).toBe("ready");
    });

    it("should reject with RemoteToolError when the server answers with an error", async () => {
      server.override("tools/call", () => ({
        error: { code: -32602, message: "bad args" },
      }));
      await transport.start();

      const call = transport.invoke("read", {}, 500);

      await expect(call).rejects.toBeInstanceOf(RemoteToolError);
      await expect(call).rejects.toThrow(
        "Server 'files' returned error -32602: bad args",
      );
    });

    it("should return an isError result unchanged", async () => {
      server.callTool = () => ({
        content: [{ type: "text", text: "file not found" }],
        isError: true,
      });
      await transport.start();

      await expect(transport.invoke("read", {}, 500)).resolves.toEqual({
        content: [{ type: "text", text: "file not found" }],
        isError: true,
      });
    });

    it("should fail only the call whose response is malformed", async () => {
      await transport.start();
      server.hold("tools/call");

      const call = transport.invoke("read", {}, 500);
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      server.sendRaw(
        JSON.stringify({ jsonrpc: "2.0", id: server.held[0].id, result: "bad" }),
      );

      await expect(call).rejects.toBeInstanceOf(ProtocolError);
      expect(transport.state).toBe("ready");
    });
  });

  describe("server messages", () => {
    it("should log and drop a line that is not JSON", async () => {
      await transport.start();

      server.sendRaw("garbage");

      await vi.waitFor(() =>
        expect(logger.error).toHaveBeenCalledWith(
          "Server 'files': dropping malformed message",
          expect.any(ProtocolError),
        ),
      );
      expect(transport.state).toBe("ready");
    });

    it("should answer ping and reject other server requests", async () => {
      await transport.start();

      server.send({ jsonrpc: "2.0", id: "srv-1", method: "ping" });
      server.send({ jsonrpc: "2.0", id: "srv-2", method: "sampling/createMessage" });

      await vi.waitFor(() => {
        expect(server.received).toContainEqual({
          jsonrpc: "2.0",
          id: "srv-1",
          result: {},
        });
        expect(server.received).toContainEqual({
          jsonrpc: "2.0",
          id: "srv-2",
          error: {
            code: -32601,
            message: "Method not supported by gateway: sampling/createMessage",
          },
        });
      });
    });

    it("should report tool list changes", async () => {
      const onChanged = vi.fn();
      transport.onToolListChanged(onChanged);
      await transport.start();

      server.notify("notifications/tools/list_changed");

      await vi.waitFor(() => expect(onChanged).toHaveBeenCalledTimes(1));
    });
  });

  describe("crash", () => {
    it("should close and fail in-flight calls when the process exits", async () => {
      const onDisconnect = vi.fn();
      transport.onDisconnect(onDisconnect);
      await transport.start();
      server.hold("tools/call");

      const call = transport.invoke("read", {}, 500);
      const assertion = expect(call).rejects.toThrow(
        new TransportDisconnected("files", "process exited with code 1"),
      );
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      children[0].exit(1);

      await assertion;
      expect(transport.state).toBe("closed");
      expect(onDisconnect).toHaveBeenCalledWith(expect.any(TransportDisconnected));
    });

    it("should deliver a reply the server writes just before exiting", async () => {
      await transport.start();
      server.hold("tools/call");

      const call = transport.invoke("read", { path: "/a" }, 500);
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      server.respond(server.held[0].id, {
        content: [{ type: "text", text: "last words" }],
      });
      children[0].exit(0);

      await expect(call).resolves.toEqual({
        content: [{ type: "text", text: "last words" }],
      });
      await vi.waitFor(() => expect(transport.state).toBe("closed"));
    });

    it("should keep a stderr line split across chunks in one piece", async () => {
      await transport.start();

      children[0].stderr.write("warning: disk ");
      children[0].stderr.write("almost full\nready\n");

      await vi.waitFor(() =>
        expect(transport.recentStderr).toEqual(["warning: disk almost full", "ready"]),
      );
      expect(logger.debug).toHaveBeenCalledWith("[files stderr] warning: disk almost full");
    });

    it("should report a signal as the exit reason", async () => {
      const onDisconnect = vi.fn();
      transport.onDisconnect(onDisconnect);
      await transport.start();

      children[0].exit(null, "SIGSEGV");

      await vi.waitFor(() => expect(onDisconnect).toHaveBeenCalledTimes(1));
      expect(onDisconnect.mock.calls[0][0]).toMatchObject({
        message: "Server 'files' is disconnected: process killed by SIGSEGV",
      });
    });
  });

  describe("stop", () => {
    it("should end stdin and terminate the process", async () => {
      await transport.start();

      await transport.stop();

      expect(children[0].stdin.writableEnded).toBe(true);
      expect(children[0].signals).toEqual(["SIGTERM"]);
      expect(transport.state).toBe("closed");
      expect(transport.pid).toBeUndefined();
    });

    it("should kill a process that ignores SIGTERM after the grace period", async () => {
      await transport.start();
      children[0].ignoreSigterm = true;

      await transport.stop();

      expect(children[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
      expect(logger.info).toHaveBeenCalledWith(
        "Server 'files' did not exit within 50ms, sending SIGKILL",
      );
    });

    it("should fail in-flight calls without reporting a disconnect", async () => {
      const onDisconnect = vi.fn();
      transport.onDisconnect(onDisconnect);
      await transport.start();
      server.hold("tools/call");

      const call = transport.invoke("read", {}, 500);
      const assertion = expect(call).rejects.toThrow(
        "Server 'files' is disconnected: transport stopped",
      );
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      await transport.stop();

      await assertion;
      expect(onDisconnect).not.toHaveBeenCalled();
    });

    it("should be a no-op the second time", async () => {
      await transport.start();

      await transport.stop();
      await transport.stop();

      expect(children[0].signals).toEqual(["SIGTERM"]);
    });

    it("should close a transport that never started", async () => {
      await transport.stop();

      expect(transport.state).toBe("closed");
      expect(children).toHaveLength(0);
    });
  });
});
