import type { ComputeInstance } from "../clients/inventory";
import { ImageVariant, INACCESSIBLE_PROJECT_PREFIX, ROOT_DISPLAY_TEXT } from "../constants";
import { InstanceLocator, ProjectLocator, ZoneLocator } from "./locators";
import { NodeCollection, ReadonlyNodeCollection } from "./nodeCollection";

export enum NodeKind {
  Root = "root",
  Project = "project",
  Zone = "zone",
  Instance = "instance",
}

/** Operating system flags; an instance carries exactly one of `Windows` or `Linux`. */
export enum OperatingSystems {
  None = 0,
  Windows = 1,
  Linux = 2,
  All = 3,
}

/** Read-only view of the connected-instance set that instance nodes consult by identity. */
export interface ConnectionStateReader {
  isConnected(instance: InstanceLocator): boolean;
}

/** A fetch of a node's children that one or more callers are waiting on. */
export interface PendingFetch<C> {
  readonly promise: Promise<C[]>;
  /** Aborts the fetch; used once every waiting caller has given up. */
  readonly controller: AbortController;
  /** {@link ChildCache.generation} when the fetch was requested. */
  readonly generation: number;
  waiters: number;
}

/**
 * Children of a container node as last fetched (`raw`, in display order), the in-flight fetch
 * if there is one, and the filtered collection handed to callers. Invalidation clears `loaded`
 * but keeps `raw`, which the visible collection is still derived from, and bumps `generation`:
 * a fetch requested in an older generation never marks the cache loaded.
 *
 * Only the ResourceTree writes to this.
 */
export class ChildCache<C> {
  raw: C[] | undefined = undefined;
  loaded: boolean = false;
  generation: number = 0;
  pending: PendingFetch<C> | null = null;
  readonly view: NodeCollection<C> = new NodeCollection<C>();

  get isLoaded(): boolean {
    return this.loaded && this.raw !== undefined;
  }
}

export class RootNode {
  readonly kind = NodeKind.Root;
  readonly displayText: string = ROOT_DISPLAY_TEXT;
  readonly imageVariant: ImageVariant = ImageVariant.Root;

  /** @internal */
  readonly childCache = new ChildCache<ProjectNode>();

  get children(): ReadonlyNodeCollection<ProjectNode> {
    return this.childCache.view;
  }
}

export class ProjectNode {
  readonly kind = NodeKind.Project;

  /** @internal */
  readonly childCache = new ChildCache<ZoneNode>();

  private constructor(
    readonly parent: RootNode,
    readonly locator: ProjectLocator,
    /** Resolved display name, or undefined when the project could not be read. */
    readonly displayName: string | undefined,
  ) {}

  static accessible(parent: RootNode, projectId: string, displayName: string): ProjectNode {
    return new ProjectNode(parent, ProjectLocator.create({ projectId }), displayName);
  }

  static inaccessible(parent: RootNode, projectId: string): ProjectNode {
    return new ProjectNode(parent, ProjectLocator.create({ projectId }), undefined);
  }

  get projectId(): string {
    return this.locator.projectId;
  }

  get isAccessible(): boolean {
    return this.displayName !== undefined;
  }

  get displayText(): string {
    if (this.displayName === undefined) {
      return `${INACCESSIBLE_PROJECT_PREFIX} (${this.projectId})`;
    }
    return this.displayName === this.projectId
      ? this.projectId
      : `${this.displayName} (${this.projectId})`;
  }

  get imageVariant(): ImageVariant {
    return this.isAccessible ? ImageVariant.Project : ImageVariant.InaccessibleProject;
  }

  get children(): ReadonlyNodeCollection<ZoneNode> {
    return this.childCache.view;
  }
}

export class ZoneNode {
  readonly kind = NodeKind.Zone;
  readonly imageVariant: ImageVariant = ImageVariant.Zone;

  /** @internal */
  readonly childCache = new ChildCache<InstanceNode>();

  /**
   * The project listing this zone was synthesized from, limited to its instances; used for the
   * first instance load and then dropped.
   * @internal
   */
  instanceSnapshot: ComputeInstance[] | undefined;

  constructor(
    readonly parent: ProjectNode,
    readonly locator: ZoneLocator,
    instanceSnapshot?: ComputeInstance[],
  ) {
    this.instanceSnapshot = instanceSnapshot;
  }

  get displayText(): string {
    return this.locator.name;
  }

  get children(): ReadonlyNodeCollection<InstanceNode> {
    return this.childCache.view;
  }
}

export class InstanceNode {
  readonly kind = NodeKind.Instance;

  constructor(
    readonly parent: ZoneNode,
    readonly locator: InstanceLocator,
    readonly instanceId: string,
    readonly operatingSystem: OperatingSystems.Windows | OperatingSystems.Linux,
    readonly status: string | undefined,
    private readonly connectionState: ConnectionStateReader,
  ) {}

  get displayText(): string {
    return this.locator.name;
  }

  get isWindows(): boolean {
    return this.operatingSystem === OperatingSystems.Windows;
  }

  get isRunning(): boolean {
    return this.status === "RUNNING";
  }

  /** Derived from the connection tracker on every read. */
  get isConnected(): boolean {
    return this.connectionState.isConnected(this.locator);
  }

  get imageVariant(): ImageVariant {
    if (this.isConnected) {
      return this.isWindows ? ImageVariant.WindowsConnected : ImageVariant.LinuxConnected;
    }
    if (this.status !== undefined && !this.isRunning) {
      return this.isWindows ? ImageVariant.WindowsStopped : ImageVariant.LinuxStopped;
    }
    return this.isWindows ? ImageVariant.WindowsDisconnected : ImageVariant.LinuxDisconnected;
  }
}

export type ExplorerNode = RootNode | ProjectNode | ZoneNode | InstanceNode;

/** Nodes that can have children. */
export type ContainerNode = RootNode | ProjectNode | ZoneNode;

export function isContainerNode(node: ExplorerNode): node is ContainerNode {
  return node.kind !== NodeKind.Instance;
}
