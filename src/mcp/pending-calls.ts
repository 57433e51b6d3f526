import type { ResponseFrame } from "./message-framing.js";
import { RemoteToolError } from "../utils/gateway-errors.js";

interface PendingCall {
  id: number;
  method: string;
  deadline: number;
  timer: NodeJS.Timeout;
  resolve: (result: Record<string, unknown>) => void;
  reject: (error: Error) => void;
}

export interface PendingCallOptions {
  method: string;
  timeoutMs: number;
  /** Builds the error the call fails with when its deadline passes. */
  onTimeout: () => Error;
}

/**
 * Correlation table for one transport: request id -> pending result slot.
 *
 * Ids come from a counter that only moves forward, so a late response for an
 * abandoned id can never be matched to a newer call.
 */
export class PendingCallTable {
  private nextId = 1;
  private calls = new Map<number, PendingCall>();

  constructor(private serverName: string) {}

  create(options: PendingCallOptions): {
    id: number;
    result: Promise<Record<string, unknown>>;
  } {
    const id = this.nextId++;
    const result = new Promise<Record<string, unknown>>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.calls.delete(id)) {
          reject(options.onTimeout());
        }
      }, options.timeoutMs);
      this.calls.set(id, {
        id,
        method: options.method,
        deadline: Date.now() + options.timeoutMs,
        timer,
        resolve,
        reject,
      });
    });
    return { id, result };
  }

  /**
   * Deliver a response to its call. Returns false when no call is waiting
   * for that id (already timed out, already failed, or never issued).
   */
  settle(frame: ResponseFrame): boolean {
    if (typeof frame.id !== "number") {
      return false;
    }
    const call = this.take(frame.id);
    if (!call) {
      return false;
    }
    if ("error" in frame) {
      call.reject(
        new RemoteToolError(
          this.serverName,
          frame.error.code,
          frame.error.message,
          frame.error.data,
        ),
      );
    } else {
      call.resolve(frame.result);
    }
    return true;
  }

  fail(id: number, error: Error): boolean {
    const call = this.take(id);
    if (!call) {
      return false;
    }
    call.reject(error);
    return true;
  }

  /** Fail every outstanding call. Returns how many were failed. */
  failAll(error: Error): number {
    const calls = Array.from(this.calls.values());
    this.calls.clear();
    for (const call of calls) {
      clearTimeout(call.timer);
      call.reject(error);
    }
    return calls.length;
  }

  outstanding(): Array<{ id: number; method: string; deadline: number }> {
    return Array.from(this.calls.values(), ({ id, method, deadline }) => ({
      id,
      method,
      deadline,
    }));
  }

  has(id: number): boolean {
    return this.calls.has(id);
  }

  get size(): number {
    return this.calls.size;
  }

  private take(id: number): PendingCall | undefined {
    const call = this.calls.get(id);
    if (!call) {
      return undefined;
    }
    this.calls.delete(id);
    clearTimeout(call.timer);
    return call;
  }
}
