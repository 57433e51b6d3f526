import { injectable } from "inversify";
import { z } from "zod";
import type { ServerDescriptor, ServerKind } from "../types/interfaces.js";
import { ConfigError } from "../utils/gateway-errors.js";

const SERVER_KINDS: readonly ServerKind[] = ["process", "stream"];

function isHttpUrl(value: string): boolean {
  return URL.canParse(value) && /^https?:$/.test(new URL(value).protocol);
}

const AllowedToolsSchema = z.array(z.string().min(1)).optional();

const ProcessDescriptorSchema = z.object({
  name: z.string().min(1),
  kind: z.literal("process"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  allowedTools: AllowedToolsSchema,
});

const StreamDescriptorSchema = z.object({
  name: z.string().min(1),
  kind: z.literal("stream"),
  url: z.string().refine(isHttpUrl, { message: "must be an http(s) URL" }),
  headers: z.record(z.string(), z.string()).default({}),
  allowedTools: AllowedToolsSchema,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function labelFor(index: number, entry: unknown): string {
  if (isRecord(entry) && typeof entry.name === "string" && entry.name !== "") {
    return `servers[${index}] "${entry.name}"`;
  }
  return `servers[${index}]`;
}

/**
 * Holds the validated server descriptors. Descriptors are frozen once loaded
 * and kept in configuration order.
 */
@injectable()
export class ServerDescriptorStore {
  private descriptors: readonly ServerDescriptor[] = [];

  /**
   * Validate and keep a parsed descriptor list.
   *
   * @throws ConfigError listing every violation found across the whole list
   */
  load(input: unknown): readonly ServerDescriptor[] {
    if (!Array.isArray(input)) {
      throw new ConfigError(["server list must be an array"]);
    }

    const violations: string[] = [];
    const accepted: ServerDescriptor[] = [];
    const firstIndexByName = new Map<string, number>();

    input.forEach((entry: unknown, index) => {
      const label = labelFor(index, entry);

      if (!isRecord(entry)) {
        violations.push(`${label}: must be an object`);
        return;
      }

      if (typeof entry.name === "string" && entry.name !== "") {
        const firstIndex = firstIndexByName.get(entry.name);
        if (firstIndex !== undefined) {
          violations.push(
            `${label}: duplicate name (already used by servers[${firstIndex}])`,
          );
        } else {
          firstIndexByName.set(entry.name, index);
        }
      }

      const kind = entry.kind;
      if (typeof kind !== "string" || !SERVER_KINDS.some((known) => known === kind)) {
        violations.push(
          `${label}: kind must be one of ${SERVER_KINDS.join(", ")} (got ${JSON.stringify(kind) ?? "nothing"})`,
        );
        return;
      }

      const parsed =
        kind === "process"
          ? ProcessDescriptorSchema.safeParse(entry)
          : StreamDescriptorSchema.safeParse(entry);

      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
          violations.push(`${label}: ${path}: ${issue.message}`);
        }
        return;
      }

      accepted.push(Object.freeze(parsed.data));
    });

    if (violations.length > 0) {
      throw new ConfigError(violations);
    }

    this.descriptors = Object.freeze(accepted);
    return this.descriptors;
  }

  list(): readonly ServerDescriptor[] {
    return this.descriptors;
  }

  get(name: string): ServerDescriptor | undefined {
    return this.descriptors.find((descriptor) => descriptor.name === name);
  }

  get size(): number {
    return this.descriptors.length;
  }
}
