import { describe, it, expect } from "vitest";
import { parseArgs } from "./cli-args.js";

describe("cli-args", () => {
  describe("parseArgs", () => {
    it("should return default values for empty args", () => {
      const result = parseArgs([]);

      expect(result).toEqual({
        configPath: undefined,
        showConfigPath: false,
        help: false,
      });
    });

    it("should detect --config-path flag", () => {
      const result = parseArgs(["--config-path"]);

      expect(result.showConfigPath).toBe(true);
    });

    it("should detect -c shorthand for config path", () => {
      const result = parseArgs(["-c"]);

      expect(result.showConfigPath).toBe(true);
    });

    it("should detect --help flag", () => {
      const result = parseArgs(["--help"]);

      expect(result.help).toBe(true);
    });

    it("should detect -h shorthand for help", () => {
      const result = parseArgs(["-h"]);

      expect(result.help).toBe(true);
    });

    it("should read the value after --config", () => {
      const result = parseArgs(["--config", "./servers.json"]);

      expect(result.configPath).toBe("./servers.json");
      expect(result.showConfigPath).toBe(false);
    });

    it("should read the value after -f", () => {
      const result = parseArgs(["-f", "/etc/gateway.json"]);

      expect(result.configPath).toBe("/etc/gateway.json");
    });

    it("should accept --config=<path>", () => {
      const result = parseArgs(["--config=other.json"]);

      expect(result.configPath).toBe("other.json");
    });

    it("should not mistake --config for --config-path", () => {
      const result = parseArgs(["--config-path", "--config", "a.json"]);

      expect(result.showConfigPath).toBe(true);
      expect(result.configPath).toBe("a.json");
    });

    it("should leave configPath undefined when --config has no value", () => {
      const result = parseArgs(["--config"]);

      expect(result.configPath).toBeUndefined();
    });

    it("should ignore unknown flags", () => {
      const result = parseArgs(["--unknown", "-x", "random"]);

      expect(result.showConfigPath).toBe(false);
      expect(result.help).toBe(false);
      expect(result.configPath).toBeUndefined();
    });
  });
});
