import { z } from "zod";

export const JSONRPC_VERSION = "2.0";

export const METHODS = {
  handshake: "initialize",
  initialized: "notifications/initialized",
  listTools: "tools/list",
  invokeTool: "tools/call",
  ping: "ping",
  toolListChanged: "notifications/tools/list_changed",
} as const;

/** JSON-RPC "method not found". */
export const METHOD_NOT_FOUND = -32601;

export type RequestId = string | number;

export interface RequestFrame {
  jsonrpc: typeof JSONRPC_VERSION;
  id: number;
  method: string;
  params?: Record<string, unknown>;
}

export interface NotificationFrame {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Record<string, unknown>;
}

const RequestIdSchema = z.union([z.string(), z.number().int()]);

const ResultFrameSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema,
  result: z.record(z.string(), z.unknown()),
});

const ErrorFrameSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema,
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  }),
});

const IncomingRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: RequestIdSchema,
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional(),
});

const IncomingNotificationSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional(),
});

export type ResultFrame = z.infer<typeof ResultFrameSchema>;
export type ErrorFrame = z.infer<typeof ErrorFrameSchema>;
export type ResponseFrame = ResultFrame | ErrorFrame;
export type IncomingRequest = z.infer<typeof IncomingRequestSchema>;

export type ServerResponseFrame =
  | { jsonrpc: typeof JSONRPC_VERSION; id: RequestId; result: Record<string, unknown> }
  | {
      jsonrpc: typeof JSONRPC_VERSION;
      id: RequestId;
      error: { code: number; message: string };
    };

export type OutboundFrame = RequestFrame | NotificationFrame | ServerResponseFrame;

export type InboundFrame =
  | { type: "response"; frame: ResponseFrame }
  | { type: "request"; frame: IncomingRequest }
  | { type: "notification"; method: string; params?: Record<string, unknown> }
  | { type: "malformed"; id?: RequestId; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function readId(value: Record<string, unknown>): RequestId | undefined {
  const id = value.id;
  return typeof id === "number" || typeof id === "string" ? id : undefined;
}

/**
 * Classify one raw message. Never throws: anything that does not fit the
 * frame shapes comes back as `malformed`, with the id when it was readable.
 */
export function decodeFrame(raw: string): InboundFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      type: "malformed",
      reason: `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    };
  }

  if (!isRecord(parsed)) {
    return { type: "malformed", reason: "message is not a JSON object" };
  }

  const id = readId(parsed);

  if (typeof parsed.method === "string") {
    if (id !== undefined) {
      const request = IncomingRequestSchema.safeParse(parsed);
      return request.success
        ? { type: "request", frame: request.data }
        : { type: "malformed", id, reason: describeIssues(request.error) };
    }
    const notification = IncomingNotificationSchema.safeParse(parsed);
    return notification.success
      ? {
          type: "notification",
          method: notification.data.method,
          params: notification.data.params,
        }
      : { type: "malformed", reason: describeIssues(notification.error) };
  }

  if ("error" in parsed) {
    const errorFrame = ErrorFrameSchema.safeParse(parsed);
    return errorFrame.success
      ? { type: "response", frame: errorFrame.data }
      : { type: "malformed", id, reason: describeIssues(errorFrame.error) };
  }

  if ("result" in parsed) {
    const resultFrame = ResultFrameSchema.safeParse(parsed);
    return resultFrame.success
      ? { type: "response", frame: resultFrame.data }
      : { type: "malformed", id, reason: describeIssues(resultFrame.error) };
  }

  return {
    type: "malformed",
    id,
    reason: "message has neither 'method', 'result' nor 'error'",
  };
}

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}

/**
 * Accumulates raw bytes from a pipe and hands back complete lines.
 */
export class LineDecoder {
  private buffer: Buffer | undefined;

  append(chunk: Buffer): void {
    this.buffer = this.buffer ? Buffer.concat([this.buffer, chunk]) : chunk;
  }

  /** Complete, non-blank lines received so far, without their terminators. */
  *lines(): Generator<string> {
    while (this.buffer) {
      const index = this.buffer.indexOf("\n");
      if (index === -1) {
        return;
      }
      const line = this.buffer.toString("utf8", 0, index).replace(/\r$/, "");
      this.buffer =
        index + 1 < this.buffer.length
          ? this.buffer.subarray(index + 1)
          : undefined;
      if (line.trim().length > 0) {
        yield line;
      }
    }
  }

  get pendingBytes(): number {
    return this.buffer?.length ?? 0;
  }

  clear(): void {
    this.buffer = undefined;
  }
}
