import {
  CancelledOperationError,
  FetchError,
  isCancellation,
  logError,
  UnknownIdentityError,
} from "../errors";
import { raceWithSignal, throwIfAborted } from "../loaders/loaderUtils";
import { NodeLoader } from "../loaders/nodeLoader";
import { Logger } from "../logging";
import type {
  InstanceLocator,
  ProjectLocator,
  ResourceLocator,
  ZoneLocator,
} from "../models/locators";
import { NodeCollection, ReadonlyNodeCollection } from "../models/nodeCollection";
import {
  ChildCache,
  ContainerNode,
  ExplorerNode,
  InstanceNode,
  NodeKind,
  PendingFetch,
  ProjectNode,
  RootNode,
  ZoneNode,
} from "../models/nodes";
import type { ProjectRepository } from "../storage/projectRepository";
import type { ConnectionStateTracker } from "./connectionTracker";
import { applyFilter, DEFAULT_FILTER, FilterState, filtersEqual } from "./filtering";

const logger = new Logger("explorer.tree");

/** Handed out for instance nodes, which never have children. */
const NO_CHILDREN: ReadonlyNodeCollection<never> = new NodeCollection<never>();

/**
 * Owns the explorer's single {@link RootNode} and everything below it. Children are fetched on
 * first request, cached per node, and served through a stable filtered collection per node whose
 * observers only ever see reset notifications.
 *
 * At most one fetch per node is in flight: concurrent requests for the same node join it, unless
 * the node was invalidated after that fetch was requested, in which case a new fetch is queued
 * behind it.
 */
export class ResourceTree {
  readonly root: RootNode = new RootNode();

  private filter: FilterState = DEFAULT_FILTER;

  /** Containers whose subtree was replaced; late fetch results for them are dropped. */
  private readonly discarded = new WeakSet<ContainerNode>();

  constructor(
    private readonly loader: NodeLoader,
    private readonly projectRepository: ProjectRepository,
    private readonly connectionTracker: ConnectionStateTracker,
  ) {}

  get currentFilter(): FilterState {
    return this.filter;
  }

  /**
   * Get the filtered children of a node, fetching them first when they are not loaded or when
   * `forceReload` is set. Loaded children are returned without waiting on any I/O.
   *
   * A reload replaces the node's collection contents (a clear reset, then an add-range reset). On
   * failure the collection is left as it was and the call rejects with a {@link FetchError}, or a
   * {@link CancelledOperationError} when `signal` was aborted.
   */
  getFilteredChildren(
    node: RootNode,
    forceReload?: boolean,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<ProjectNode>>;
  getFilteredChildren(
    node: ProjectNode,
    forceReload?: boolean,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<ZoneNode>>;
  getFilteredChildren(
    node: ZoneNode,
    forceReload?: boolean,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<InstanceNode>>;
  getFilteredChildren(
    node: InstanceNode,
    forceReload?: boolean,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<never>>;
  getFilteredChildren(
    node: ExplorerNode,
    forceReload?: boolean,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<ExplorerNode>>;
  async getFilteredChildren(
    node: ExplorerNode,
    forceReload: boolean = false,
    signal?: AbortSignal,
  ): Promise<ReadonlyNodeCollection<ExplorerNode>> {
    switch (node.kind) {
      case NodeKind.Root:
        return await this.ensureChildren(
          node,
          node.childCache,
          (fetchSignal) => this.loader.loadProjects(node, fetchSignal),
          forceReload,
          signal,
        );
      case NodeKind.Project:
        return await this.ensureChildren(
          node,
          node.childCache,
          (fetchSignal) => this.loader.loadZones(node, fetchSignal),
          forceReload,
          signal,
        );
      case NodeKind.Zone:
        return await this.ensureChildren(
          node,
          node.childCache,
          (fetchSignal) => this.loader.loadInstances(node, forceReload, fetchSignal),
          forceReload,
          signal,
        );
      case NodeKind.Instance:
        return NO_CHILDREN;
    }
  }

  /**
   * Mark a node's children as not loaded, so the next {@link getFilteredChildren} call fetches
   * them. Nothing is fetched or published now.
   */
  invalidate(node: ExplorerNode): void {
    if (node.kind === NodeKind.Instance) {
      return;
    }
    logger.debug(`invalidating children of ${describe(node)}`);
    node.childCache.loaded = false;
    node.childCache.generation++;
  }

  /**
   * Reload cached data.
   *
   * @param reloadProjects When true, re-list all tracked projects. Otherwise keep the project
   *   list (and publish nothing for it) but reload the zones of every project whose zones were
   *   loaded.
   */
  async refresh(reloadProjects: boolean, signal?: AbortSignal): Promise<void> {
    if (reloadProjects) {
      logger.info("refreshing all projects");
      await this.getFilteredChildren(this.root, true, signal);
      return;
    }

    const loadedProjects = (this.root.childCache.raw ?? []).filter(
      (project) => project.childCache.isLoaded,
    );
    logger.info(`refreshing zones of ${loadedProjects.length} loaded project(s)`);
    await Promise.all(
      loadedProjects.map((project) => this.getFilteredChildren(project, true, signal)),
    );
  }

  /** Track a project and, if the project list is showing, reload it. */
  async addTrackedProject(projectId: string): Promise<void> {
    const added = await this.projectRepository.addProject(projectId);
    if (!added) {
      logger.info(`project ${projectId} is already tracked`);
      return;
    }
    await this.reloadProjectsIfShown();
  }

  /** Stop tracking a project and, if the project list is showing, reload it. */
  async removeTrackedProject(projectId: string): Promise<void> {
    const removed = await this.projectRepository.removeProject(projectId);
    if (!removed) {
      logger.info(`project ${projectId} is not tracked`);
      return;
    }
    await this.reloadProjectsIfShown();
  }

  /**
   * Change what is shown: re-filter every node whose children have been fetched, resetting only
   * the collections whose visible contents change. Never fetches anything.
   */
  setFilter(filter: FilterState): void {
    if (filtersEqual(filter, this.filter)) {
      return;
    }
    this.filter = { ...filter };
    this.reapplyFilter(this.root);
  }

  /**
   * Resolve a locator against the fetched part of the tree.
   *
   * @throws {UnknownIdentityError} if the resource (or one of its ancestors) has not been fetched
   */
  findNode(locator: InstanceLocator): InstanceNode;
  findNode(locator: ZoneLocator): ZoneNode;
  findNode(locator: ProjectLocator): ProjectNode;
  findNode(locator: ResourceLocator): ProjectNode | ZoneNode | InstanceNode;
  findNode(locator: ResourceLocator): ProjectNode | ZoneNode | InstanceNode {
    const project = findByKey(this.root.childCache.raw, `projects/${locator.projectId}`);
    switch (locator.resourceType) {
      case "project":
        return orThrow(project, locator);
      case "zone":
        return orThrow(findByKey(project?.childCache.raw, locator.toString()), locator);
      case "instance": {
        const zone = findByKey(project?.childCache.raw, locator.zoneLocator.toString());
        return orThrow(findByKey(zone?.childCache.raw, locator.toString()), locator);
      }
    }
  }

  private async reloadProjectsIfShown(): Promise<void> {
    this.invalidate(this.root);
    if (this.root.childCache.raw !== undefined) {
      await this.getFilteredChildren(this.root, true);
    }
  }

  private async ensureChildren<C extends ExplorerNode>(
    owner: ContainerNode,
    cache: ChildCache<C>,
    fetch: (signal: AbortSignal) => Promise<C[]>,
    forceReload: boolean,
    signal: AbortSignal | undefined,
  ): Promise<ReadonlyNodeCollection<C>> {
    if (!forceReload && cache.isLoaded) {
      return cache.view;
    }
    throwIfAborted(signal);

    let pending = cache.pending;
    if (pending?.generation === cache.generation) {
      logger.debug(`joining in-flight fetch for ${describe(owner)}`);
    } else {
      if (pending) {
        logger.debug(`${describe(owner)} was invalidated during its fetch, queueing another`);
      }
      pending = this.startFetch(owner, cache, fetch, pending);
      cache.pending = pending;
    }

    pending.waiters++;
    try {
      await raceWithSignal(pending.promise, signal);
    } finally {
      pending.waiters--;
      if (pending.waiters === 0 && cache.pending === pending) {
        logger.debug(`every caller gave up on ${describe(owner)}, aborting its fetch`);
        cache.pending = null;
        pending.controller.abort();
      }
    }
    return cache.view;
  }

  private startFetch<C extends ExplorerNode>(
    owner: ContainerNode,
    cache: ChildCache<C>,
    fetch: (signal: AbortSignal) => Promise<C[]>,
    previous: PendingFetch<C> | null,
  ): PendingFetch<C> {
    const controller = new AbortController();
    const generation = cache.generation;
    const promise = (async () => {
      const fetchLogger = logger.withCallpoint("fetch");
      try {
        if (previous) {
          // its outcome was already reported to its own callers
          await Promise.allSettled([previous.promise]);
          throwIfAborted(controller.signal);
        }
        fetchLogger.debug(`fetching children of ${describe(owner)}`);
        const children = await fetch(controller.signal);
        throwIfAborted(controller.signal);
        this.commit(owner, cache, children, generation);
        fetchLogger.debug(`fetched ${children.length} child(ren) of ${describe(owner)}`);
        return children;
      } catch (error) {
        if (isCancellation(error)) {
          fetchLogger.debug(`fetch of ${describe(owner)} was cancelled`);
          throw error instanceof CancelledOperationError
            ? error
            : new CancelledOperationError(undefined, { cause: error });
        }
        const cause = error instanceof Error ? error : new Error(String(error));
        const fetchError = new FetchError(`Failed to load children of ${describe(owner)}`, cause);
        logError(fetchError, "loading explorer children", {
          extra: { node: describe(owner) },
        });
        throw fetchError;
      } finally {
        if (cache.pending?.controller === controller) {
          cache.pending = null;
        }
      }
    })();
    return { promise, controller, generation, waiters: 0 };
  }

  /** Replace a node's children and publish them, keeping the connection tracker in step. */
  private commit<C extends ExplorerNode>(
    owner: ContainerNode,
    cache: ChildCache<C>,
    children: C[],
    generation: number,
  ): void {
    if (this.discarded.has(owner)) {
      logger.debug(`dropping children fetched for discarded ${describe(owner)}`);
      return;
    }
    const previous = cache.raw ?? [];

    // track before untracking so instances present in both lists keep their state
    this.connectionTracker.trackInstances(collectInstances(children));
    cache.raw = children;
    if (cache.generation === generation) {
      cache.loaded = true;
    } else {
      logger.debug(`${describe(owner)} was invalidated during its fetch, leaving it not loaded`);
    }
    this.discard(previous);

    cache.view.replaceAll(applyFilter(children, this.filter));
  }

  /** Forget a replaced subtree: late fetch results are dropped and instances untracked. */
  private discard(nodes: readonly ExplorerNode[]): void {
    const instances = collectInstances(nodes);
    const markDiscarded = (node: ExplorerNode): void => {
      if (node.kind === NodeKind.Instance) {
        return;
      }
      this.discarded.add(node);
      for (const child of node.childCache.raw ?? []) {
        markDiscarded(child);
      }
    };
    nodes.forEach(markDiscarded);
    this.connectionTracker.untrackInstances(instances);
  }

  private reapplyFilter(node: ExplorerNode): void {
    if (node.kind === NodeKind.Instance) {
      return;
    }
    const raw: readonly ExplorerNode[] | undefined = node.childCache.raw;
    if (raw === undefined) {
      return;
    }
    // narrowed per kind so that each cache keeps its own element type
    switch (node.kind) {
      case NodeKind.Root:
        republish(node.childCache, this.filter);
        break;
      case NodeKind.Project:
        republish(node.childCache, this.filter);
        break;
      case NodeKind.Zone:
        republish(node.childCache, this.filter);
        break;
    }
    raw.forEach((child) => this.reapplyFilter(child));
  }
}

/** Reset a collection to the filtered raw children, only if what is visible changes. */
function republish<C extends ExplorerNode>(cache: ChildCache<C>, filter: FilterState): void {
  const visible = applyFilter(cache.raw ?? [], filter);
  if (!cache.view.hasSameItems(visible)) {
    cache.view.replaceAll(visible);
  }
}

/** Locators of every instance among the given nodes and their fetched descendants. */
function collectInstances(nodes: readonly ExplorerNode[]): InstanceLocator[] {
  const locators: InstanceLocator[] = [];
  for (const node of nodes) {
    if (node.kind === NodeKind.Instance) {
      locators.push(node.locator);
    } else {
      locators.push(...collectInstances(node.childCache.raw ?? []));
    }
  }
  return locators;
}

function findByKey<T extends ProjectNode | ZoneNode | InstanceNode>(
  nodes: readonly T[] | undefined,
  key: string,
): T | undefined {
  return nodes?.find((node) => node.locator.toString() === key);
}

function orThrow<T>(node: T | undefined, locator: ResourceLocator): T {
  if (node === undefined) {
    throw new UnknownIdentityError(locator.toString());
  }
  return node;
}

function describe(node: ContainerNode): string {
  return node.kind === NodeKind.Root ? "root" : node.locator.toString();
}
