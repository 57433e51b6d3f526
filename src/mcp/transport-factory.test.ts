import { describe, it, expect, vi } from "vitest";
import { TransportFactory } from "./transport-factory.js";
import { ProcessTransport } from "./process-transport.js";
import { StreamTransport } from "./stream-transport.js";
import type { GatewayConfig, ILogger } from "../types/interfaces.js";

// Mock logger
const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

const config: GatewayConfig = {
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

describe("TransportFactory", () => {
  const factory = new TransportFactory(config, createMockLogger());

  it("should create a process transport for a process server", () => {
    const transport = factory.create({
      name: "files",
      kind: "process",
      command: "file-server",
      args: ["--root", "/tmp"],
      env: {},
    });

    expect(transport).toBeInstanceOf(ProcessTransport);
    expect(transport.kind).toBe("process");
    expect(transport.serverName).toBe("files");
    expect(transport.state).toBe("disconnected");
  });

  it("should create a stream transport for a stream server", () => {
    const transport = factory.create({
      name: "search",
      kind: "stream",
      url: "http://localhost:9000/sse",
      headers: {},
    });

    expect(transport).toBeInstanceOf(StreamTransport);
    expect(transport.kind).toBe("stream");
    expect(transport.serverName).toBe("search");
    expect(transport.state).toBe("disconnected");
  });

  it("should create a fresh transport on every call", () => {
    const descriptor = {
      name: "files",
      kind: "process",
      command: "file-server",
      args: [],
      env: {},
    } as const;

    expect(factory.create(descriptor)).not.toBe(factory.create(descriptor));
  });
});
