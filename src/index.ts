export type { CloudConsoleService } from "./clients/cloudConsole";
export type {
  AttachedDisk,
  ComputeInstance,
  GuestOsFeature,
  InventoryAdapter,
  ProjectMetadata,
} from "./clients/inventory";
export type { SessionBroker } from "./clients/sessionBroker";
export { getConfigs, type ExplorerConfig } from "./configs";
export { ImageVariant, ROOT_DISPLAY_TEXT } from "./constants";
export { ContextValues, ContextValueStore, type ContextValueChange } from "./context/values";
export {
  AccessDeniedError,
  CancelledOperationError,
  FetchError,
  UnknownIdentityError,
  logError,
} from "./errors";
export { InProcessEventBus, type EventBus, type SessionEventHandler } from "./events/eventBus";
export {
  SessionEndedEvent,
  SessionEventKind,
  SessionStartedEvent,
  type SessionEvent,
} from "./events/sessionEvents";
export {
  ConnectionStateTracker,
  type ConnectionStateChange,
} from "./explorer/connectionTracker";
export {
  applyFilter,
  DEFAULT_FILTER,
  instanceMatchesFilter,
  type FilterState,
} from "./explorer/filtering";
export {
  ProjectExplorer,
  type ExplorerProperties,
  type ProjectExplorerServices,
  type PropertyChange,
} from "./explorer/projectExplorer";
export { ResourceTree } from "./explorer/resourceTree";
export {
  SelectionController,
  SelectionState,
  type CommandVisibility,
} from "./explorer/selection";
export { NodeLoader } from "./loaders/nodeLoader";
export { cleanupOldLogFiles, Logger, LogLevel, LOG_SINK, setLogLevel } from "./logging";
export {
  InstanceLocator,
  ProjectLocator,
  ZoneLocator,
  type ResourceLocator,
} from "./models/locators";
export type { CollectionResetEvent, ReadonlyNodeCollection } from "./models/nodeCollection";
export {
  InstanceNode,
  NodeKind,
  OperatingSystems,
  ProjectNode,
  RootNode,
  ZoneNode,
  type ExplorerNode,
} from "./models/nodes";
export { INCLUDE_LINUX_INSTANCES, INCLUDE_WINDOWS_INSTANCES } from "./settings/constants";
export { InMemorySettingsStore, type SettingsStore } from "./settings/store";
export {
  InMemoryProjectRepository,
  JsonFileProjectRepository,
  type ProjectRepository,
} from "./storage/projectRepository";
export { closeSentryClient, initSentry } from "./telemetry/sentryClient";
