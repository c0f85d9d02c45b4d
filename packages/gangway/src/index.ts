export { CATCH_ALL, ProxyResource, ProxyResourceBuilder, addProxy } from "./proxy-resource.js";
export type { RouteOptions } from "./proxy-resource.js";
export { ProxyLifecycleHook, listenUrls } from "./lifecycle.js";
export type { ProxyLifecycleState } from "./lifecycle.js";
export { APP_SETTINGS_FILE, DEFAULT_LISTEN_URL, ProxyHost, ProxyHostBuilder } from "./proxy-host.js";
export type { ProxyHostBuilderOptions } from "./proxy-host.js";
export { ROUTE_HEADER, createProxyServer } from "./proxy.js";
export type { ProxyServer } from "./proxy.js";
export { PATH_REMOVE_PREFIX, applyTransforms, matchHost, removePathPrefix } from "./routing.js";
export { ProxyConfigurationError, loadProxyConfigFromSection, mergeProxyConfigs } from "./config-loader.js";
export { ServiceEndpointResolver } from "./service-discovery.js";
export {
  Configuration,
  ConfigurationBuilder,
  ConfigurationError,
  ConfigurationSection,
} from "./configuration.js";
export { ResourceLoggerRelay } from "./logger.js";
export type { LogFields, LogLevel, Logger } from "./logger.js";
export { createConsoleLogger, formatLogLine, resolveLogLevel } from "./console-logger.js";
export { DEFAULT_TOPOLOGY_FILE, TopologyError, buildTopology, loadTopology, parseTopology } from "./topology.js";
export type { Topology, TopologyApplication } from "./topology.js";
export type {
  ClusterConfig,
  DestinationConfig,
  DestinationResolver,
  ProxyConfig,
  RouteConfig,
  RouteMatch,
  Transform,
} from "./types.js";

export { DistributedApplication } from "./host/application.js";
export type { Manifest, ManifestBinding, ManifestResource } from "./host/application.js";
export {
  DistributedApplicationBuilder,
  LifecycleHookRegistry,
  ResourceBuilder,
  ResourceCollection,
} from "./host/builder.js";
export type {
  AddResourceOptions,
  DistributedApplicationOptions,
  HostEnvironment,
  HostServices,
  LifecycleHook,
  LifecycleHookFactory,
} from "./host/builder.js";
export { resolveEnvironment } from "./host/environment.js";
export { DuplicateResourceError, EndpointNotAllocatedError, UnsupportedValueTypeError } from "./host/errors.js";
export { ExecutableResource } from "./host/executable.js";
export type { ExecutableOptions } from "./host/executable.js";
export { ResourceLoggerService } from "./host/logging.js";
export {
  EndpointAnnotation,
  EndpointReference,
  ExecutionContext,
  Resource,
} from "./host/model.js";
export type {
  AllocatedEndpoint,
  ApplicationModel,
  EndpointOptions,
  ResourceWithServiceDiscovery,
  ValueProvider,
} from "./host/model.js";
export { ResourceNotificationService } from "./host/notifications.js";
export { DEFAULT_PORT_RANGE, PortAllocator } from "./host/ports.js";
export type { PortRange } from "./host/ports.js";
export type { ResourceSnapshot, UrlSnapshot } from "./host/notifications.js";
