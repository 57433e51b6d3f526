import { setTimeout as sleep } from "node:timers/promises";
import { createParser, type EventSourceMessage } from "eventsource-parser";
import type { ILogger, StreamServerDescriptor } from "../types/interfaces.js";
import {
  ProtocolError,
  TransportStartupError,
  errorMessage,
} from "../utils/gateway-errors.js";
import { BaseTransport, type TransportOptions } from "./base-transport.js";
import { encodeFrame, type OutboundFrame } from "./message-framing.js";

export type FetchLike = typeof fetch;

interface EndpointWaiter {
  resolve: (endpoint: URL) => void;
  reject: (error: Error) => void;
}

/**
 * Transport for an independently running server reached over HTTP.
 *
 * A long-lived GET carries the server's event stream: the first `endpoint`
 * event says where requests are POSTed, and `message` events carry the
 * responses. When the stream drops the transport goes Degraded and reconnects
 * with exponential backoff; when it runs out of attempts it is Closed.
 */
export class StreamTransport extends BaseTransport {
  readonly kind = "stream" as const;

  private endpoint: URL | undefined;
  private streamAbort: AbortController | undefined;
  private lifetime = new AbortController();
  private generation = 0;
  private endpointWaiter: EndpointWaiter | undefined;
  private reconnecting: Promise<void> | undefined;
  private stopped = false;

  constructor(
    private readonly remote: StreamServerDescriptor,
    options: TransportOptions,
    logger: ILogger,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    super(remote, options, logger);
  }

  async start(): Promise<void> {
    if (!this.transition("starting")) {
      throw new TransportStartupError(
        this.serverName,
        `cannot start a transport that is ${this.state}`,
      );
    }

    this.logger.info(
      `Connecting to server '${this.serverName}' at ${this.remote.url}`,
    );

    try {
      await this.connect();
      await this.handshake();
      this.assertStreamOpen();
    } catch (error) {
      this.closeStream();
      this.failPending(this.disconnected(`startup failed: ${errorMessage(error)}`));
      this.transition("closed");
      throw error instanceof TransportStartupError
        ? error
        : new TransportStartupError(this.serverName, errorMessage(error), {
            cause: error,
          });
    }

    if (!this.transition("ready")) {
      throw new TransportStartupError(
        this.serverName,
        "transport was stopped during startup",
      );
    }
    this.logger.info(
      `MCP client ${this.serverName} connected to ${this.remote.url}`,
    );
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.lifetime.abort();
    this.closeStream();
    this.failPending(this.disconnected("transport stopped"));

    if (this.reconnecting) {
      await this.reconnecting;
    }
    this.transition("closed");
    this.logger.debug(`Server '${this.serverName}': event stream released`);
  }

  protected async sendFrame(
    frame: OutboundFrame,
    timeoutMs: number,
  ): Promise<void> {
    const endpoint = this.endpoint;
    if (!endpoint || !this.streamAbort) {
      throw this.disconnected("no open event stream");
    }

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: this.headers("content-type", "application/json"),
        body: encodeFrame(frame),
        signal: AbortSignal.any([
          this.lifetime.signal,
          AbortSignal.timeout(timeoutMs),
        ]),
      });
    } catch (error) {
      throw this.disconnected(
        `POST ${endpoint.pathname} failed: ${errorMessage(error)}`,
      );
    }

    await response.body?.cancel();
    if (!response.ok) {
      throw this.disconnected(
        `POST ${endpoint.pathname} returned HTTP ${response.status}`,
      );
    }
  }

  /**
   * Open a fresh event stream and wait for its `endpoint` event. One
   * deadline covers both the GET and the wait for the endpoint.
   */
  private async connect(): Promise<void> {
    this.closeStream();
    const generation = ++this.generation;
    const controller = new AbortController();
    this.streamAbort = controller;

    const timeoutMs = this.options.handshakeTimeoutMs;
    let waitingFor = "response to the event stream request";
    let expire: (error: Error) => void = () => {};
    const deadline = new Promise<never>((_resolve, reject) => {
      expire = reject;
    });
    const timer = setTimeout(() => {
      controller.abort();
      expire(new Error(`no ${waitingFor} within ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      const response = await Promise.race([
        this.fetchImpl(this.remote.url, {
          method: "GET",
          headers: this.headers("accept", "text/event-stream"),
          signal: controller.signal,
        }),
        deadline,
      ]);

      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`event stream request returned HTTP ${response.status}`);
      }
      if (!response.body) {
        throw new Error("event stream response has no body");
      }

      const endpointReady = new Promise<URL>((resolve, reject) => {
        this.endpointWaiter = { resolve, reject };
      });
      void this.consume(response.body, generation);

      waitingFor = "endpoint event";
      this.endpoint = await Promise.race([endpointReady, deadline]);
    } finally {
      clearTimeout(timer);
      this.endpointWaiter = undefined;
    }
    this.logger.debug(
      `Server '${this.serverName}': posting requests to ${this.endpoint.href}`,
    );
  }

  /** Configured headers with one protocol header forced to `value`. */
  private headers(name: string, value: string): Headers {
    const headers = new Headers(this.remote.headers);
    headers.set(name, value);
    return headers;
  }

  /** The stream can end mid-handshake; such a session is not usable. */
  private assertStreamOpen(): void {
    if (!this.streamAbort || !this.endpoint) {
      throw new Error("event stream ended during the handshake");
    }
  }

  private async consume(
    body: NonNullable<Response["body"]>,
    generation: number,
  ): Promise<void> {
    const parser = createParser({
      onEvent: (event) => this.handleEvent(event, generation),
    });
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let reason = "event stream ended";

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        parser.feed(decoder.decode(value, { stream: true }));
      }
    } catch (error) {
      reason = `event stream failed: ${errorMessage(error)}`;
    } finally {
      reader.releaseLock();
    }

    this.handleStreamEnd(generation, reason);
  }

  private handleEvent(event: EventSourceMessage, generation: number): void {
    if (generation !== this.generation) {
      return;
    }

    if (event.event === "endpoint") {
      this.resolveEndpoint(event.data);
      return;
    }

    if (event.event === undefined || event.event === "message") {
      this.handleInbound(event.data);
      return;
    }

    this.logger.debug(
      `Server '${this.serverName}': ignoring '${event.event}' event`,
    );
  }

  private resolveEndpoint(data: string): void {
    const waiter = this.endpointWaiter;
    if (!waiter) {
      return;
    }
    this.endpointWaiter = undefined;

    let endpoint: URL;
    try {
      endpoint = new URL(data, this.remote.url);
    } catch (error) {
      waiter.reject(
        new ProtocolError(
          this.serverName,
          `invalid endpoint '${data}': ${errorMessage(error)}`,
        ),
      );
      return;
    }

    const origin = new URL(this.remote.url).origin;
    if (endpoint.origin !== origin) {
      waiter.reject(
        new ProtocolError(
          this.serverName,
          `endpoint origin ${endpoint.origin} does not match ${origin}`,
        ),
      );
      return;
    }
    waiter.resolve(endpoint);
  }

  private handleStreamEnd(generation: number, reason: string): void {
    if (generation !== this.generation || this.stopped) {
      return;
    }
    this.streamAbort = undefined;
    this.endpoint = undefined;

    const error = this.disconnected(reason);
    this.endpointWaiter?.reject(error);
    this.endpointWaiter = undefined;
    // Responses for the old stream's requests can no longer arrive.
    this.failPending(error);

    if (this.state !== "ready") {
      return;
    }

    this.logger.error(
      `Server '${this.serverName}': ${reason}, reconnecting`,
    );
    this.transition("degraded");
    this.emitDisconnect(error);
    this.reconnecting = this.reconnect().finally(() => {
      this.reconnecting = undefined;
    });
  }

  private async reconnect(): Promise<void> {
    const { maxAttempts, initialDelayMs, maxDelayMs, backoffMultiplier } =
      this.options.reconnect;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const delay = Math.min(
        initialDelayMs * backoffMultiplier ** (attempt - 1),
        maxDelayMs,
      );
      this.logger.info(
        `Server '${this.serverName}': reconnection attempt ${attempt}/${maxAttempts} in ${delay}ms`,
      );

      try {
        await sleep(delay, undefined, { signal: this.lifetime.signal });
      } catch {
        // aborted by stop()
        return;
      }

      try {
        await this.connect();
        await this.handshake();
        this.assertStreamOpen();
      } catch (error) {
        this.closeStream();
        this.logger.error(
          `Server '${this.serverName}': reconnection attempt ${attempt} failed`,
          error,
        );
        continue;
      }

      if (this.stopped) {
        return;
      }
      this.transition("ready");
      this.logger.info(`Server '${this.serverName}': reconnected`);
      this.emitReconnect();
      return;
    }

    const error = this.disconnected(
      `gave up after ${maxAttempts} reconnection attempts`,
    );
    this.transition("closed");
    this.failPending(error);
    this.logger.error(`Server '${this.serverName}' is closed`, error);
    this.emitDisconnect(error);
  }

  private closeStream(): void {
    this.generation++;
    this.endpointWaiter?.reject(this.disconnected("event stream closed"));
    this.endpointWaiter = undefined;
    this.streamAbort?.abort();
    this.streamAbort = undefined;
    this.endpoint = undefined;
  }
}
