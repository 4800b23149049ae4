import type { CloudConsoleService } from "../clients/cloudConsole";
import type { InventoryAdapter } from "../clients/inventory";
import type { SessionBroker } from "../clients/sessionBroker";
import { ContextValueStore } from "../context/values";
import { logError } from "../errors";
import type { EventBus } from "../events/eventBus";
import { NodeLoader } from "../loaders/nodeLoader";
import { Logger } from "../logging";
import type { ReadonlyNodeCollection } from "../models/nodeCollection";
import {
  ExplorerNode,
  NodeKind,
  OperatingSystems,
  ProjectNode,
  RootNode,
} from "../models/nodes";
import { INCLUDE_LINUX_INSTANCES, INCLUDE_WINDOWS_INSTANCES } from "../settings/constants";
import type { SettingsStore } from "../settings/store";
import type { ProjectRepository } from "../storage/projectRepository";
import { DisposableCollection } from "../utils/disposables";
import { Emitter, Event } from "../utils/emitter";
import { ConnectionStateChange, ConnectionStateTracker } from "./connectionTracker";
import { ResourceTree } from "./resourceTree";
import { CommandVisibility, SelectionController } from "./selection";

const logger = new Logger("explorer.projectExplorer");

/** Everything the explorer talks to. */
export interface ProjectExplorerServices {
  projectRepository: ProjectRepository;
  inventory: InventoryAdapter;
  eventBus: EventBus;
  sessionBroker: SessionBroker;
  cloudConsole: CloudConsoleService;
  settingsStore: SettingsStore;
}

/** Bindable properties of the explorer. */
export interface ExplorerProperties {
  operatingSystemsFilter: OperatingSystems;
  isWindowsIncluded: boolean;
  isLinuxIncluded: boolean;
  instanceFilter: string | null;
}

export type PropertyChange = {
  [K in keyof ExplorerProperties]: { property: K; value: ExplorerProperties[K] };
}[keyof ExplorerProperties];

/**
 * Entry point for a presentation layer: owns the resource tree, the selection and the filter
 * settings, and runs the commands that act on the selected node.
 */
export class ProjectExplorer extends DisposableCollection {
  readonly tree: ResourceTree;
  readonly selection: SelectionController;
  readonly contextValues = new ContextValueStore();

  private readonly connectionTracker: ConnectionStateTracker;
  private readonly cloudConsole: CloudConsoleService;
  private readonly settingsStore: SettingsStore;

  private _operatingSystemsFilter: OperatingSystems;
  private _instanceFilter: string | null = null;
  private settingsWrite: Promise<void> = Promise.resolve();

  private readonly _onDidChangeProperty = new Emitter<PropertyChange>();
  /** Fires once per property for every assignment, whether or not the value changed. */
  readonly onDidChangeProperty: Event<PropertyChange> = this._onDidChangeProperty.event;

  constructor(services: ProjectExplorerServices) {
    super();
    this.cloudConsole = services.cloudConsole;
    this.settingsStore = services.settingsStore;

    this.connectionTracker = new ConnectionStateTracker(services.eventBus, services.sessionBroker);
    const loader = new NodeLoader(
      services.projectRepository,
      services.inventory,
      this.connectionTracker,
    );
    this.tree = new ResourceTree(loader, services.projectRepository, this.connectionTracker);
    this.selection = new SelectionController(this.contextValues);

    this._operatingSystemsFilter =
      (INCLUDE_WINDOWS_INSTANCES.value(this.settingsStore) ? OperatingSystems.Windows : 0) |
      (INCLUDE_LINUX_INSTANCES.value(this.settingsStore) ? OperatingSystems.Linux : 0);
    this.applyFilter();

    this.disposables.push(
      this.connectionTracker,
      this.selection,
      this.contextValues,
      this._onDidChangeProperty,
    );
  }

  get root(): RootNode {
    return this.tree.root;
  }

  /** Fires when a loaded instance connects or disconnects. */
  get onDidChangeConnectionState(): Event<ConnectionStateChange> {
    return this.connectionTracker.onDidChangeConnectionState;
  }

  //
  // Filter properties.
  //

  get operatingSystemsFilter(): OperatingSystems {
    return this._operatingSystemsFilter;
  }

  set operatingSystemsFilter(value: OperatingSystems) {
    this._operatingSystemsFilter = value;
    this.onOperatingSystemsChanged();
    this.fire({ property: "operatingSystemsFilter", value });
    this.fire({ property: "isWindowsIncluded", value: this.isWindowsIncluded });
    this.fire({ property: "isLinuxIncluded", value: this.isLinuxIncluded });
  }

  get isWindowsIncluded(): boolean {
    return (this._operatingSystemsFilter & OperatingSystems.Windows) !== 0;
  }

  set isWindowsIncluded(value: boolean) {
    this._operatingSystemsFilter = value
      ? this._operatingSystemsFilter | OperatingSystems.Windows
      : this._operatingSystemsFilter & ~OperatingSystems.Windows;
    this.onOperatingSystemsChanged();
    this.fire({ property: "isWindowsIncluded", value });
    this.fire({ property: "operatingSystemsFilter", value: this._operatingSystemsFilter });
  }

  get isLinuxIncluded(): boolean {
    return (this._operatingSystemsFilter & OperatingSystems.Linux) !== 0;
  }

  set isLinuxIncluded(value: boolean) {
    this._operatingSystemsFilter = value
      ? this._operatingSystemsFilter | OperatingSystems.Linux
      : this._operatingSystemsFilter & ~OperatingSystems.Linux;
    this.onOperatingSystemsChanged();
    this.fire({ property: "isLinuxIncluded", value });
    this.fire({ property: "operatingSystemsFilter", value: this._operatingSystemsFilter });
  }

  get instanceFilter(): string | null {
    return this._instanceFilter;
  }

  set instanceFilter(value: string | null) {
    this._instanceFilter = value;
    this.applyFilter();
    this.fire({ property: "instanceFilter", value });
  }

  /** Resolves once every filter setting assigned so far has been written to the store. */
  async whenSettingsSaved(): Promise<void> {
    await this.settingsWrite;
  }

  //
  // Selection.
  //

  get selectedNode(): ExplorerNode | null {
    return this.selection.selectedNode;
  }

  set selectedNode(node: ExplorerNode | null) {
    this.selection.selectedNode = node;
  }

  get commandVisibility(): CommandVisibility {
    return this.selection.commandVisibility;
  }

  //
  // Tree operations.
  //

  async expandRoot(signal?: AbortSignal): Promise<ReadonlyNodeCollection<ProjectNode>> {
    return await this.tree.getFilteredChildren(this.root, false, signal);
  }

  async addProject(projectId: string): Promise<void> {
    await this.tree.addTrackedProject(projectId);
  }

  async removeProject(projectId: string): Promise<void> {
    await this.tree.removeTrackedProject(projectId);
  }

  async refresh(reloadProjects: boolean, signal?: AbortSignal): Promise<void> {
    await this.tree.refresh(reloadProjects, signal);
  }

  /** Refresh what the selection calls for: everything for the root, zones otherwise. */
  async refreshSelectedNode(signal?: AbortSignal): Promise<void> {
    await this.tree.refresh(this.selection.refreshScope().reloadProjects, signal);
  }

  /** Stop tracking the selected project. Does nothing unless a project is selected. */
  async unloadSelectedProject(): Promise<void> {
    const node = this.selection.selectedNode;
    if (node?.kind !== NodeKind.Project) {
      logger.debug("no project selected, nothing to unload");
      return;
    }
    await this.removeProject(node.projectId);
  }

  //
  // Cloud console.
  //

  openInCloudConsole(): void {
    const node = this.selection.selectedNode;
    switch (node?.kind) {
      case NodeKind.Project:
      case NodeKind.Zone:
        this.cloudConsole.openInstanceList(node.locator);
        break;
      case NodeKind.Instance:
        this.cloudConsole.openInstanceDetails(node.locator);
        break;
      default:
        logger.debug("selection has no cloud console page");
    }
  }

  configureIapAccess(): void {
    const node = this.selection.selectedNode;
    switch (node?.kind) {
      case NodeKind.Project:
      case NodeKind.Zone:
      case NodeKind.Instance:
        this.cloudConsole.configureIapAccess(node.locator.projectId);
        break;
      default:
        logger.debug("selection belongs to no project");
    }
  }

  private onOperatingSystemsChanged(): void {
    this.applyFilter();
    const windows = this.isWindowsIncluded;
    const linux = this.isLinuxIncluded;
    this.settingsWrite = this.settingsWrite
      .then(async () => {
        await INCLUDE_WINDOWS_INSTANCES.update(this.settingsStore, windows);
        await INCLUDE_LINUX_INSTANCES.update(this.settingsStore, linux);
      })
      .catch((error: unknown) => {
        logError(error, "saving operating system filter settings");
      });
  }

  private applyFilter(): void {
    this.tree.setFilter({
      operatingSystems: this._operatingSystemsFilter,
      instanceNamePattern: this._instanceFilter ?? undefined,
    });
  }

  private fire(change: PropertyChange): void {
    this._onDidChangeProperty.fire(change);
  }
}
