import type { InstanceLocator } from "../models/locators";

/** Knows which instances currently have an open remote session. */
export interface SessionBroker {
  /** Point-in-time query, used only when an instance node is created. */
  isConnected(instance: InstanceLocator): boolean;
}
