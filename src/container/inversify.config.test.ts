import { describe, it, expect, vi } from "vitest";
import { createContainer, resolve } from "./inversify.config.js";
import { ServerDescriptorStore } from "../services/descriptor-store.js";
import { ToolCatalog } from "../services/tool-catalog.js";
import { LifecycleManager } from "../services/lifecycle-manager.js";
import { Dispatcher } from "../services/dispatcher.js";
import { TransportFactory } from "../mcp/transport-factory.js";
import { GatewayServer } from "../mcp/gateway-server.js";
import { ShutdownHandler } from "../handlers/shutdown-handler.js";
import { FakeTransport } from "../services/fake-transport.test-helper.js";
import type {
  GatewayConfig,
  ILogger,
  ITransportFactory,
} from "../types/interfaces.js";

// Mock logger
const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

const config: GatewayConfig = {
  configPath: "/tmp/config.json",
  settings: {
    handshakeTimeoutMs: 30000,
    callTimeoutMs: 60000,
    shutdownGraceMs: 5000,
    logLevel: "info",
    reconnect: {
      maxAttempts: 5,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      backoffMultiplier: 2,
    },
  },
};

const createStore = (): ServerDescriptorStore => {
  const store = new ServerDescriptorStore();
  store.load([{ name: "files", kind: "process", command: "file-server" }]);
  return store;
};

describe("createContainer", () => {
  it("should wire every service", () => {
    const logger = createMockLogger();
    const store = createStore();
    const container = createContainer(config, store, { logger });

    expect(resolve(container, "GatewayConfig")).toBe(config);
    expect(resolve(container, "ServerDescriptorStore")).toBe(store);
    expect(resolve(container, "Logger")).toBe(logger);
    expect(resolve(container, "TransportFactory")).toBeInstanceOf(TransportFactory);
    expect(resolve(container, "ToolCatalog")).toBeInstanceOf(ToolCatalog);
    expect(resolve(container, "LifecycleManager")).toBeInstanceOf(LifecycleManager);
    expect(resolve(container, "Dispatcher")).toBeInstanceOf(Dispatcher);
    expect(resolve(container, "GatewayServer")).toBeInstanceOf(GatewayServer);
    expect(resolve(container, "ShutdownHandler")).toBeInstanceOf(ShutdownHandler);
  });

  it("should hand out singletons", () => {
    const container = createContainer(config, createStore(), {
      logger: createMockLogger(),
    });

    expect(resolve(container, "ToolCatalog")).toBe(resolve(container, "ToolCatalog"));
    expect(resolve(container, "LifecycleManager")).toBe(
      resolve(container, "LifecycleManager"),
    );
    expect(resolve(container, "GatewayServer")).toBe(resolve(container, "GatewayServer"));
  });

  it("should start servers through an overridden transport factory", async () => {
    const files = new FakeTransport("files", ["read"]);
    const transportFactory: ITransportFactory = { create: () => files };
    const container = createContainer(config, createStore(), {
      logger: createMockLogger(),
      transportFactory,
    });

    const report = await resolve(container, "LifecycleManager").startAll();
    const outcome = await resolve(container, "Dispatcher").call("read", { path: "/a" });

    expect(report.started).toEqual(["files"]);
    expect(resolve(container, "ToolCatalog").lookup("read")).toBe("files");
    expect(outcome).toMatchObject({ ok: true, toolName: "read", serverName: "files" });
    await resolve(container, "ShutdownHandler").shutdown();
    expect(files.stop).toHaveBeenCalledTimes(1);
  });
});
