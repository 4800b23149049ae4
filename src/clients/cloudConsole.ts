import type { InstanceLocator, ProjectLocator, ZoneLocator } from "../models/locators";

/** Opens pages of the cloud provider's web console. Calls are fire-and-forget. */
export interface CloudConsoleService {
  openInstanceList(scope: ProjectLocator | ZoneLocator): void;
  openInstanceDetails(instance: InstanceLocator): void;
  configureIapAccess(projectId: string): void;
}
