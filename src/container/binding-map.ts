import type {
  GatewayConfig,
  IDispatcher,
  ILifecycleManager,
  ILogger,
  IShutdownHandler,
  IToolCatalog,
  ITransportFactory,
} from "../types/interfaces.js";
import type { ServerDescriptorStore } from "../services/descriptor-store.js";
import type { GatewayServer } from "../mcp/gateway-server.js";

/**
 * Binding map that defines all services available in the DI container.
 * Keys match the identifiers in `TYPES`, so `resolve` can be type checked.
 */
export interface ContainerBindingMap {
  GatewayConfig: GatewayConfig;
  Logger: ILogger;
  ServerDescriptorStore: ServerDescriptorStore;
  TransportFactory: ITransportFactory;
  ToolCatalog: IToolCatalog;
  LifecycleManager: ILifecycleManager;
  Dispatcher: IDispatcher;
  GatewayServer: GatewayServer;
  ShutdownHandler: IShutdownHandler;
}
