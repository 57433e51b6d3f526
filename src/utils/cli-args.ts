export interface CLIArgs {
  configPath?: string;
  showConfigPath: boolean;
  help: boolean;
}

/**
 * Parse command line arguments.
 *
 * @param argv - Process arguments (typically process.argv.slice(2))
 * @returns Parsed CLI arguments
 */
export function parseArgs(argv: string[]): CLIArgs {
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config" || arg === "-f") {
      configPath = argv[i + 1];
      i++;
    } else if (arg.startsWith("--config=")) {
      configPath = arg.slice("--config=".length);
    }
  }

  return {
    configPath,
    showConfigPath: argv.includes("--config-path") || argv.includes("-c"),
    help: argv.includes("--help") || argv.includes("-h"),
  };
}
