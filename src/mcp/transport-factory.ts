import { injectable, inject } from "inversify";
import type {
  GatewayConfig,
  ILogger,
  ITransport,
  ITransportFactory,
  ServerDescriptor,
} from "../types/interfaces.js";
import { TYPES } from "../types/index.js";
import type { TransportOptions } from "./base-transport.js";
import { ProcessTransport } from "./process-transport.js";
import { StreamTransport } from "./stream-transport.js";

/**
 * Picks the transport variant for a descriptor. The choice is made once per
 * server and holds for the transport's whole life.
 */
@injectable()
export class TransportFactory implements ITransportFactory {
  private options: TransportOptions;

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    const { handshakeTimeoutMs, callTimeoutMs, shutdownGraceMs, reconnect } =
      config.settings;
    this.options = {
      handshakeTimeoutMs,
      requestTimeoutMs: callTimeoutMs,
      shutdownGraceMs,
      reconnect,
    };
  }

  create(descriptor: ServerDescriptor): ITransport {
    switch (descriptor.kind) {
      case "process":
        return new ProcessTransport(descriptor, this.options, this.logger);
      case "stream":
        return new StreamTransport(descriptor, this.options, this.logger);
    }
  }
}
