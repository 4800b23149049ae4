import type { ComputeInstance, InventoryAdapter } from "../clients/inventory";
import { isAccessDeniedError } from "../errors";
import { Logger } from "../logging";
import { InstanceLocator, ZoneLocator } from "../models/locators";
import {
  ConnectionStateReader,
  InstanceNode,
  ProjectNode,
  RootNode,
  ZoneNode,
} from "../models/nodes";
import type { ProjectRepository } from "../storage/projectRepository";
import {
  compareOrdinal,
  detectOperatingSystem,
  groupInstancesByZone,
  throwIfAborted,
  zoneNameFromUrl,
} from "./loaderUtils";

const logger = new Logger("loaders.nodeLoader");

/**
 * Fetch strategy for each level of the explorer tree. Every method returns freshly created,
 * display-ordered child nodes and leaves the parent untouched; deciding when to call, and
 * publishing the result, is the ResourceTree's business.
 */
export class NodeLoader {
  constructor(
    private readonly projectRepository: ProjectRepository,
    private readonly inventory: InventoryAdapter,
    private readonly connectionState: ConnectionStateReader,
  ) {}

  /**
   * One node per tracked project id, ordered by display text. A project whose metadata may not be
   * read becomes an inaccessible placeholder; any other failure rejects the whole load.
   */
  async loadProjects(root: RootNode, signal?: AbortSignal): Promise<ProjectNode[]> {
    throwIfAborted(signal);
    const projectIds = await this.projectRepository.listProjects();
    throwIfAborted(signal);

    logger.debug(`loading metadata for ${projectIds.length} tracked project(s)`);
    const projects = await Promise.all(
      projectIds.map((projectId) => this.loadProject(root, projectId, signal)),
    );
    throwIfAborted(signal);

    return projects.sort(
      (a, b) =>
        compareOrdinal(a.displayText, b.displayText) ||
        compareOrdinal(a.locator.toString(), b.locator.toString()),
    );
  }

  /**
   * Zones of a project, derived from one instance listing: only zones holding at least one
   * instance appear. Each zone keeps its share of the listing for its first instance load.
   */
  async loadZones(project: ProjectNode, signal?: AbortSignal): Promise<ZoneNode[]> {
    if (!project.isAccessible) {
      return [];
    }
    throwIfAborted(signal);
    const instances = await this.inventory.listInstances(project.projectId, signal);
    throwIfAborted(signal);

    const zones: ZoneNode[] = [];
    for (const [zoneName, zoneInstances] of groupInstancesByZone(instances)) {
      const locator = ZoneLocator.create({ projectId: project.projectId, name: zoneName });
      zones.push(new ZoneNode(project, locator, zoneInstances));
    }
    logger.debug(`project ${project.projectId} has instances in ${zones.length} zone(s)`);
    return zones;
  }

  /**
   * Instances of a zone, ordered by name. Unless `forceReload` is set, the listing the zone was
   * created from is used (once); otherwise the project's instances are listed again and narrowed
   * to this zone.
   */
  async loadInstances(
    zone: ZoneNode,
    forceReload: boolean = false,
    signal?: AbortSignal,
  ): Promise<InstanceNode[]> {
    const snapshot = forceReload ? undefined : zone.instanceSnapshot;
    zone.instanceSnapshot = undefined;

    let records: ComputeInstance[];
    if (snapshot) {
      records = snapshot;
    } else {
      throwIfAborted(signal);
      const projectId = zone.locator.projectId;
      const listed = await this.inventory.listInstances(projectId, signal);
      throwIfAborted(signal);
      records = listed.filter((instance) => zoneNameFromUrl(instance.zone) === zone.locator.name);
    }

    return records
      .map((record) => this.toInstanceNode(zone, record))
      .sort((a, b) => compareOrdinal(a.displayText, b.displayText));
  }

  private async loadProject(
    root: RootNode,
    projectId: string,
    signal?: AbortSignal,
  ): Promise<ProjectNode> {
    try {
      const metadata = await this.inventory.getProject(projectId, signal);
      return ProjectNode.accessible(root, projectId, metadata.name);
    } catch (error) {
      if (isAccessDeniedError(error)) {
        logger.warn(`access to project ${projectId} denied, showing it as inaccessible`);
        return ProjectNode.inaccessible(root, projectId);
      }
      throw error;
    }
  }

  private toInstanceNode(zone: ZoneNode, record: ComputeInstance): InstanceNode {
    const locator = InstanceLocator.create({
      projectId: zone.locator.projectId,
      zone: zone.locator.name,
      name: record.name,
    });
    return new InstanceNode(
      zone,
      locator,
      record.id,
      detectOperatingSystem(record),
      record.status,
      this.connectionState,
    );
  }
}
