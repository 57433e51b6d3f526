#!/usr/bin/env node
import "reflect-metadata";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createContainer, resolve } from "./container/inversify.config.js";
import { ServerDescriptorStore } from "./services/descriptor-store.js";
import { loadConfig, mergeEnvConfig } from "./utils/config-loader.js";
import { parseArgs } from "./utils/cli-args.js";
import { getConfigPaths, resolveConfigPath } from "./utils/config-paths.js";
import { ConfigError } from "./utils/gateway-errors.js";

/**
 * Print help information.
 *
 * Note: We use console.log here instead of the injected logger because
 * these CLI utilities run before the DI container is created (which requires
 * loading config first).
 */
function printHelp(): void {
  console.log("MCP Tool Gateway - one MCP endpoint for many tool servers\n");
  console.log("Usage: tool-gateway [options]\n");
  console.log("Options:");
  console.log("  -f, --config <path>  Load this config file");
  console.log("  -c, --config-path    Show config file search paths and exit");
  console.log("  -h, --help           Show this help message and exit\n");
  console.log("Environment variables:");
  console.log("  CONFIG_PATH                   Override config file location");
  console.log("  LOG_LEVEL                     fatal | error | warn | info | debug | trace");
  console.log("  GATEWAY_HANDSHAKE_TIMEOUT_MS  Handshake deadline per server");
  console.log("  GATEWAY_CALL_TIMEOUT_MS       Default deadline per tool call");
  console.log("  GATEWAY_SHUTDOWN_GRACE_MS     Wait before a server process is killed");
}

function printConfigPaths(flagPath: string | undefined): void {
  console.log("Config file search order:\n");
  const selected = resolveConfigPath(flagPath);
  for (const p of getConfigPaths(flagPath)) {
    const status = p.exists ? "[EXISTS]" : "[NOT FOUND]";
    const marker = p.path === selected.path ? " (selected)" : "";
    console.log(`  ${status} ${p.source}${marker}`);
    console.log(`          ${p.path}\n`);
  }
}

async function main(): Promise<void> {
  // Handle CLI arguments before loading config
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  if (args.showConfigPath) {
    printConfigPaths(args.configPath);
    return;
  }

  // Any ConfigError here aborts before a single server is started
  const location = resolveConfigPath(args.configPath);
  const loaded = loadConfig(location.path);
  const config = mergeEnvConfig(loaded.config);
  const store = new ServerDescriptorStore();
  store.load(loaded.servers);

  const container = createContainer(config, store);
  const logger = resolve(container, "Logger");
  const lifecycle = resolve(container, "LifecycleManager");
  const gatewayServer = resolve(container, "GatewayServer");
  const shutdownHandler = resolve(container, "ShutdownHandler");

  logger.info(`Loaded ${store.size} servers from ${location.path}`);

  const report = await lifecycle.startAll();
  if (store.size > 0 && report.started.length === 0) {
    logger.warn(
      "All configured servers failed to start. Gateway running with an empty catalog.",
    );
  }

  await gatewayServer.connect(new StdioServerTransport());
  logger.info("MCP Tool Gateway running in stdio mode");

  // Graceful shutdown
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}`);
    shutdownHandler
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exit(1);
});
