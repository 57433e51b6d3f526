import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import type { ILogger, ProcessServerDescriptor } from "../types/interfaces.js";
import {
  TransportStartupError,
  errorMessage,
} from "../utils/gateway-errors.js";
import { BaseTransport, type TransportOptions } from "./base-transport.js";
import {
  LineDecoder,
  encodeFrame,
  type OutboundFrame,
} from "./message-framing.js";

export type ProcessSpawner = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => ChildProcess;

const STDERR_TAIL_LINES = 20;

/**
 * Transport for a server the gateway spawns itself. Frames travel as single
 * JSON lines over the child's stdin/stdout; stderr is diagnostics only.
 *
 * There is no Degraded state here: once the process is gone the transport is
 * Closed for good, since the same process cannot be reattached.
 */
export class ProcessTransport extends BaseTransport {
  readonly kind = "process" as const;

  private child: ChildProcess | undefined;
  private exited: Promise<void> | undefined;
  private decoder = new LineDecoder();
  private stderrDecoder = new LineDecoder();
  private stderrTail: string[] = [];
  private stopping = false;

  constructor(
    private readonly launch: ProcessServerDescriptor,
    options: TransportOptions,
    logger: ILogger,
    private readonly spawner: ProcessSpawner = spawn,
  ) {
    super(launch, options, logger);
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /** Last lines the server wrote to stderr. */
  get recentStderr(): string[] {
    return [...this.stderrTail];
  }

  async start(): Promise<void> {
    if (!this.transition("starting")) {
      throw new TransportStartupError(
        this.serverName,
        `cannot start a transport that is ${this.state}`,
      );
    }

    const { command, args, env } = this.launch;
    this.logger.info(
      `Starting server '${this.serverName}': ${command} ${args.join(" ")}`.trimEnd(),
    );

    try {
      this.spawnChild(command, [...args], { ...process.env, ...env });
      await this.handshake();
    } catch (error) {
      await this.teardown(`startup failed: ${errorMessage(error)}`);
      throw this.startupError(error);
    }

    if (!this.transition("ready")) {
      throw new TransportStartupError(
        this.serverName,
        "transport was stopped during startup",
      );
    }
    this.logger.info(
      `MCP client ${this.serverName} connected to stdio process: ${command} ${args.join(" ")}`.trimEnd(),
    );
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;
    await this.teardown("transport stopped");
  }

  protected sendFrame(frame: OutboundFrame): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin || !stdin.writable) {
      return Promise.reject(this.disconnected("stdin is closed"));
    }

    return new Promise<void>((resolve, reject) => {
      stdin.write(`${encodeFrame(frame)}\n`, (error) => {
        if (error) {
          reject(this.disconnected(`write failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  private spawnChild(
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv,
  ): void {
    const child = this.spawner(command, args, {
      env,
      stdio: ["pipe", "pipe", "pipe"],
      shell: false,
      windowsHide: true,
    });
    this.child = child;

    // "exit" can arrive before stdout is drained; "close" cannot.
    this.exited = new Promise<void>((resolve) => {
      child.once("close", (code, signal) => {
        resolve();
        this.handleExit(
          child,
          signal ? `process killed by ${signal}` : `process exited with code ${code}`,
        );
      });
      child.once("error", (error) => {
        resolve();
        this.handleExit(child, `process error: ${error.message}`);
      });
    });

    child.stdout?.on("data", (chunk: Buffer) => {
      this.decoder.append(chunk);
      for (const line of this.decoder.lines()) {
        this.handleInbound(line);
      }
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      this.stderrDecoder.append(chunk);
      for (const line of this.stderrDecoder.lines()) {
        this.stderrTail.push(line);
        if (this.stderrTail.length > STDERR_TAIL_LINES) {
          this.stderrTail.shift();
        }
        this.logger.debug(`[${this.serverName} stderr] ${line}`);
      }
    });

    // EPIPE after the child dies surfaces through the write callback and the close event.
    child.stdin?.on("error", (error) => {
      this.logger.debug(
        `Server '${this.serverName}': stdin error: ${error.message}`,
      );
    });
  }

  private handleExit(child: ChildProcess, reason: string): void {
    if (child !== this.child) {
      return;
    }
    const wasReady = this.state === "ready";
    this.child = undefined;
    this.releaseStreams(child);

    const error = this.disconnected(reason);
    this.failPending(error);

    if (!wasReady) {
      this.transition("closed");
      return;
    }

    this.logger.error(
      `Server '${this.serverName}' exited unexpectedly: ${reason}`,
    );
    this.transition("closed");
    this.emitDisconnect(error);
  }

  /**
   * Single release path for stop, crash and startup failure: fail what is in
   * flight, ask the process to exit, and kill it if it will not.
   */
  private async teardown(reason: string): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    this.child = undefined;

    this.failPending(this.disconnected(reason));

    if (child && exited) {
      this.releaseStreams(child);
      const grace = this.options.shutdownGraceMs;

      child.stdin?.end();
      child.kill("SIGTERM");

      if (!(await waitFor(exited, grace))) {
        this.logger.info(
          `Server '${this.serverName}' did not exit within ${grace}ms, sending SIGKILL`,
        );
        child.kill("SIGKILL");
        await waitFor(exited, grace);
      }
      this.logger.debug(`Server '${this.serverName}': process released`);
    }

    this.decoder.clear();
    this.stderrDecoder.clear();
    this.transition("closed");
  }

  private releaseStreams(child: ChildProcess): void {
    child.stdout?.removeAllListeners("data");
    child.stderr?.removeAllListeners("data");
  }

  private startupError(error: unknown): TransportStartupError {
    if (error instanceof TransportStartupError) {
      return error;
    }
    const stderr =
      this.stderrTail.length > 0
        ? ` (stderr: ${this.stderrTail.join(" | ")})`
        : "";
    return new TransportStartupError(
      this.serverName,
      `${errorMessage(error)}${stderr}`,
      {
        cause: error,
      },
    );
  }
}

function waitFor(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      },
    );
  });
}
