/**
 * Dependency injection identifiers for the container.
 * String literals rather than symbols, so ContainerBindingMap can key on them.
 */
export const TYPES = {
  GatewayConfig: "GatewayConfig",
  Logger: "Logger",
  ServerDescriptorStore: "ServerDescriptorStore",
  TransportFactory: "TransportFactory",
  ToolCatalog: "ToolCatalog",
  LifecycleManager: "LifecycleManager",
  Dispatcher: "Dispatcher",
  GatewayServer: "GatewayServer",
  ShutdownHandler: "ShutdownHandler",
} as const;
