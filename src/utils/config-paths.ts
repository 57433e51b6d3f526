import envPaths from "env-paths";
import { existsSync } from "fs";
import { resolve } from "path";

const APP_NAME = "mcp-tool-gateway";
const CONFIG_FILENAME = "config.json";

// Get platform-specific paths (disable nodejs suffix for cleaner paths)
const paths = envPaths(APP_NAME, { suffix: "" });

export interface ConfigPathInfo {
  path: string;
  source: "flag" | "env" | "cwd" | "platform";
  exists: boolean;
}

/**
 * Get all potential config paths in priority order.
 *
 * Search order:
 * 1. --config flag (explicit override)
 * 2. CONFIG_PATH environment variable
 * 3. config.json in the current working directory
 * 4. Platform-specific user directory:
 *    - Windows: %APPDATA%\mcp-tool-gateway\config.json
 *    - macOS: ~/Library/Application Support/mcp-tool-gateway/config.json
 *    - Linux: ~/.config/mcp-tool-gateway/config.json (respects $XDG_CONFIG_HOME)
 */
export function getConfigPaths(
  flagPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ConfigPathInfo[] {
  const result: ConfigPathInfo[] = [];

  if (flagPath) {
    const path = resolve(cwd, flagPath);
    result.push({ path, source: "flag", exists: existsSync(path) });
  }

  if (env.CONFIG_PATH) {
    const path = resolve(cwd, env.CONFIG_PATH);
    result.push({ path, source: "env", exists: existsSync(path) });
  }

  const cwdPath = resolve(cwd, CONFIG_FILENAME);
  result.push({ path: cwdPath, source: "cwd", exists: existsSync(cwdPath) });

  const platformPath = resolve(paths.config, CONFIG_FILENAME);
  result.push({
    path: platformPath,
    source: "platform",
    exists: existsSync(platformPath),
  });

  return result;
}

/**
 * Pick the config file to load. An explicit flag or CONFIG_PATH wins even
 * when the file is missing, so the error names the path the user asked for.
 */
export function resolveConfigPath(
  flagPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ConfigPathInfo {
  const candidates = getConfigPaths(flagPath, env, cwd);
  const explicit = candidates.find(
    (candidate) => candidate.source === "flag" || candidate.source === "env",
  );
  if (explicit) {
    return explicit;
  }
  return (
    candidates.find((candidate) => candidate.exists) ??
    candidates[candidates.length - 1]
  );
}
