import { ContextValues, ContextValueStore } from "../context/values";
import { Logger } from "../logging";
import { ExplorerNode, NodeKind } from "../models/nodes";
import { Emitter, Event } from "../utils/emitter";

const logger = new Logger("explorer.selection");

export enum SelectionState {
  NoSelection = "noSelection",
  RootSelected = "rootSelected",
  ProjectSelected = "projectSelected",
  ZoneSelected = "zoneSelected",
  InstanceSelected = "instanceSelected",
}

/** Which selection commands are available. */
export interface CommandVisibility {
  unloadProject: boolean;
  refreshProjects: boolean;
  refreshAllProjects: boolean;
  openInCloudConsole: boolean;
  configureIapAccess: boolean;
}

const NO_RESOURCE: CommandVisibility = Object.freeze({
  unloadProject: false,
  refreshProjects: false,
  refreshAllProjects: true,
  openInCloudConsole: false,
  configureIapAccess: false,
});

const PROJECT_RESOURCE: CommandVisibility = Object.freeze({
  unloadProject: false,
  refreshProjects: true,
  refreshAllProjects: false,
  openInCloudConsole: true,
  configureIapAccess: true,
});

const COMMAND_VISIBILITY: Record<SelectionState, CommandVisibility> = {
  [SelectionState.NoSelection]: NO_RESOURCE,
  [SelectionState.RootSelected]: NO_RESOURCE,
  [SelectionState.ProjectSelected]: Object.freeze({ ...PROJECT_RESOURCE, unloadProject: true }),
  [SelectionState.ZoneSelected]: PROJECT_RESOURCE,
  [SelectionState.InstanceSelected]: PROJECT_RESOURCE,
};

/** Publishing order of the flags; pairs each with its context key. */
const CONTEXT_KEYS: [keyof CommandVisibility, ContextValues][] = [
  ["unloadProject", ContextValues.canUnloadProject],
  ["refreshProjects", ContextValues.canRefreshProjects],
  ["refreshAllProjects", ContextValues.canRefreshAllProjects],
  ["openInCloudConsole", ContextValues.canOpenInCloudConsole],
  ["configureIapAccess", ContextValues.canConfigureIapAccess],
];

export function selectionStateOf(node: ExplorerNode | null): SelectionState {
  if (node === null) {
    return SelectionState.NoSelection;
  }
  switch (node.kind) {
    case NodeKind.Root:
      return SelectionState.RootSelected;
    case NodeKind.Project:
      return SelectionState.ProjectSelected;
    case NodeKind.Zone:
      return SelectionState.ZoneSelected;
    case NodeKind.Instance:
      return SelectionState.InstanceSelected;
  }
}

/**
 * Tracks the selected node and derives which commands apply to it. The state changes only when a
 * selection is assigned; every assignment republishes the flags to the context value store.
 */
export class SelectionController {
  private _selectedNode: ExplorerNode | null = null;

  private readonly _onDidChangeSelection = new Emitter<ExplorerNode | null>();
  readonly onDidChangeSelection: Event<ExplorerNode | null> = this._onDidChangeSelection.event;

  constructor(private readonly contextValues: ContextValueStore) {
    this.publish();
  }

  get selectedNode(): ExplorerNode | null {
    return this._selectedNode;
  }

  set selectedNode(node: ExplorerNode | null) {
    this._selectedNode = node;
    logger.debug(`selection is now ${this.state}`);
    this.publish();
    this._onDidChangeSelection.fire(node);
  }

  get state(): SelectionState {
    return selectionStateOf(this._selectedNode);
  }

  get commandVisibility(): CommandVisibility {
    return COMMAND_VISIBILITY[this.state];
  }

  /**
   * Scope of "refresh" for the current selection: with nothing or the root selected, the project
   * list itself is reloaded.
   */
  refreshScope(): { reloadProjects: boolean } {
    const state = this.state;
    return {
      reloadProjects:
        state === SelectionState.NoSelection || state === SelectionState.RootSelected,
    };
  }

  dispose(): void {
    this._onDidChangeSelection.dispose();
  }

  private publish(): void {
    const visibility = this.commandVisibility;
    for (const [flag, key] of CONTEXT_KEYS) {
      this.contextValues.setContextValue(key, visibility[flag]);
    }
  }
}
