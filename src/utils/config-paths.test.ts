import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync, rmSync, existsSync } from "fs";
import { resolve } from "path";
import { tmpdir } from "os";
import { getConfigPaths, resolveConfigPath } from "./config-paths.js";

describe("config-paths", () => {
  let tempDir: string;

  beforeEach(() => {
    // Create a unique temp directory for each test
    tempDir = resolve(tmpdir(), `config-paths-test-${Date.now()}-${Math.random()}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe("getConfigPaths", () => {
    it("should list cwd then platform when nothing is set", () => {
      const paths = getConfigPaths(undefined, {}, tempDir);

      expect(paths.map((p) => p.source)).toEqual(["cwd", "platform"]);
      expect(paths[0].path).toBe(resolve(tempDir, "config.json"));
      expect(paths[0].exists).toBe(false);
      expect(paths[1].path).toContain("mcp-tool-gateway");
      expect(paths[1].path).toMatch(/config\.json$/);
    });

    it("should put the flag first and CONFIG_PATH second", () => {
      const paths = getConfigPaths(
        "flag.json",
        { CONFIG_PATH: "env.json" },
        tempDir,
      );

      expect(paths.map((p) => p.source)).toEqual([
        "flag",
        "env",
        "cwd",
        "platform",
      ]);
      expect(paths[0].path).toBe(resolve(tempDir, "flag.json"));
      expect(paths[1].path).toBe(resolve(tempDir, "env.json"));
    });

    it("should report whether each file exists", () => {
      writeFileSync(resolve(tempDir, "config.json"), "{}");

      const paths = getConfigPaths(undefined, {}, tempDir);

      expect(paths[0].exists).toBe(true);
    });
  });

  describe("resolveConfigPath", () => {
    it("should pick the flag even when the file is missing", () => {
      writeFileSync(resolve(tempDir, "config.json"), "{}");

      const selected = resolveConfigPath("missing.json", {}, tempDir);

      expect(selected.source).toBe("flag");
      expect(selected.path).toBe(resolve(tempDir, "missing.json"));
      expect(selected.exists).toBe(false);
    });

    it("should pick CONFIG_PATH over a config.json in cwd", () => {
      writeFileSync(resolve(tempDir, "config.json"), "{}");

      const selected = resolveConfigPath(
        undefined,
        { CONFIG_PATH: "env.json" },
        tempDir,
      );

      expect(selected.source).toBe("env");
    });

    it("should pick config.json in cwd when it exists", () => {
      writeFileSync(resolve(tempDir, "config.json"), "{}");

      const selected = resolveConfigPath(undefined, {}, tempDir);

      expect(selected).toEqual({
        path: resolve(tempDir, "config.json"),
        source: "cwd",
        exists: true,
      });
    });
  });
});
