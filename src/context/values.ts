import { Emitter, Event } from "../utils/emitter";

/** Command-enablement flags published for the current selection. */
export enum ContextValues {
  /** The selected node is a project that can be removed from the explorer. */
  canUnloadProject = "explorer.canUnloadProject",
  /** A project, zone or instance is selected; refreshing reloads the zones of loaded projects. */
  canRefreshProjects = "explorer.canRefreshProjects",
  /** Nothing or the root is selected; refreshing re-lists every tracked project. */
  canRefreshAllProjects = "explorer.canRefreshAllProjects",
  /** The selected node has a page in the cloud console. */
  canOpenInCloudConsole = "explorer.canOpenInCloudConsole",
  /** The selected node belongs to a project whose access settings can be opened. */
  canConfigureIapAccess = "explorer.canConfigureIapAccess",
}

export interface ContextValueChange {
  key: ContextValues;
  value: boolean;
}

/**
 * Local store of the context values, so a presentation layer can both query them and be told when
 * one changes.
 */
export class ContextValueStore {
  private readonly values = new Map<ContextValues, boolean>();

  private readonly _onDidChange = new Emitter<ContextValueChange>();
  /** Fires for every assignment whose value differs from the stored one. */
  readonly onDidChange: Event<ContextValueChange> = this._onDidChange.event;

  /**
   * Sets the context value and notifies listeners if it changed.
   * @param key The key of the context value (must be defined in {@link ContextValues})
   */
  setContextValue(key: ContextValues, value: boolean): void {
    if (!Object.values(ContextValues).includes(key)) {
      throw new Error(`Unknown contextValue "${key}"; add it to ContextValues before using it`);
    }
    if (this.values.get(key) === value) {
      return;
    }
    this.values.set(key, value);
    this._onDidChange.fire({ key, value });
  }

  /** Unset values read as false. */
  getContextValue(key: ContextValues): boolean {
    return this.values.get(key) ?? false;
  }

  dispose(): void {
    this._onDidChange.dispose();
  }
}
