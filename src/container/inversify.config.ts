import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "../types/index.js";
import type {
  GatewayConfig,
  IDispatcher,
  ILifecycleManager,
  ILogger,
  IShutdownHandler,
  IToolCatalog,
  ITransportFactory,
} from "../types/interfaces.js";
import type { ContainerBindingMap } from "./binding-map.js";
import { ConsoleLogger } from "../utils/logger.js";
import { ServerDescriptorStore } from "../services/descriptor-store.js";
import { TransportFactory } from "../mcp/transport-factory.js";
import { ToolCatalog } from "../services/tool-catalog.js";
import { LifecycleManager } from "../services/lifecycle-manager.js";
import { Dispatcher } from "../services/dispatcher.js";
import { GatewayServer } from "../mcp/gateway-server.js";
import { ShutdownHandler } from "../handlers/shutdown-handler.js";

export interface ContainerOverrides {
  logger?: ILogger;
  transportFactory?: ITransportFactory;
}

/**
 * Build the container for one gateway. The descriptor store must already
 * be loaded; everything else is a singleton created on first use.
 */
export function createContainer(
  config: GatewayConfig,
  store: ServerDescriptorStore,
  overrides: ContainerOverrides = {},
): Container {
  const container = new Container();

  // Bind configuration
  container.bind<GatewayConfig>(TYPES.GatewayConfig).toConstantValue(config);
  container
    .bind<ServerDescriptorStore>(TYPES.ServerDescriptorStore)
    .toConstantValue(store);

  // Bind logger
  if (overrides.logger) {
    container.bind<ILogger>(TYPES.Logger).toConstantValue(overrides.logger);
  } else {
    container.bind<ILogger>(TYPES.Logger).to(ConsoleLogger).inSingletonScope();
  }

  // Bind transport factory
  if (overrides.transportFactory) {
    container
      .bind<ITransportFactory>(TYPES.TransportFactory)
      .toConstantValue(overrides.transportFactory);
  } else {
    container
      .bind<ITransportFactory>(TYPES.TransportFactory)
      .to(TransportFactory)
      .inSingletonScope();
  }

  container
    .bind<IToolCatalog>(TYPES.ToolCatalog)
    .to(ToolCatalog)
    .inSingletonScope();

  container
    .bind<ILifecycleManager>(TYPES.LifecycleManager)
    .to(LifecycleManager)
    .inSingletonScope();

  container
    .bind<IDispatcher>(TYPES.Dispatcher)
    .to(Dispatcher)
    .inSingletonScope();

  // Bind gateway server (singleton - one stdio front per process)
  container
    .bind<GatewayServer>(TYPES.GatewayServer)
    .to(GatewayServer)
    .inSingletonScope();

  // Bind shutdown handler
  container
    .bind<IShutdownHandler>(TYPES.ShutdownHandler)
    .to(ShutdownHandler)
    .inSingletonScope();

  return container;
}

/** Typed lookup keyed by the `TYPES` identifier name. */
export function resolve<K extends keyof ContainerBindingMap>(
  container: Container,
  id: K,
): ContainerBindingMap[K] {
  return container.get<ContainerBindingMap[K]>(TYPES[id]);
}
