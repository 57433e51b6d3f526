import { injectable, inject } from "inversify";
import type { GatewayConfig, ILogger } from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import pino from "pino";

@injectable()
export class ConsoleLogger implements ILogger {
  private logger: pino.Logger;

  constructor(@inject(TYPES.GatewayConfig) config: GatewayConfig) {
    this.logger = pino({
      level: config.settings.logLevel,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2, // Output to stderr (2) instead of stdout (1)
        },
      },
    });
  }

  info(message: string, meta?: unknown): void {
    if (meta === undefined) {
      this.logger.info(message);
    } else {
      this.logger.info({ meta }, message);
    }
  }

  warn(message: string, meta?: unknown): void {
    if (meta === undefined) {
      this.logger.warn(message);
    } else {
      this.logger.warn({ meta }, message);
    }
  }

  error(msgOrErr: string | Error, error?: unknown): void {
    if (typeof msgOrErr === "string") {
      if (error !== undefined) {
        this.logger.error({ err: error }, msgOrErr);
      } else {
        this.logger.error(msgOrErr);
      }
    } else {
      this.logger.error(msgOrErr);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (meta === undefined) {
      this.logger.debug(message);
    } else {
      this.logger.debug({ meta }, message);
    }
  }
}
