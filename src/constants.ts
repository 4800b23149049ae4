/** Text of the single root node. */
export const ROOT_DISPLAY_TEXT = "Google Cloud";

/** Display text of a project whose metadata could not be read is `${prefix} (<project id>)`. */
export const INACCESSIBLE_PROJECT_PREFIX = "inaccessible project";

/** Guest OS feature reported by the disks of Windows instances. */
export const WINDOWS_GUEST_OS_FEATURE = "WINDOWS";

/**
 * Ids of the images a UI should render for each node. Instances vary by operating system and
 * connection/running state.
 */
export enum ImageVariant {
  Root = "cloud",
  Project = "project",
  InaccessibleProject = "project-inaccessible",
  Zone = "zone",
  WindowsConnected = "windows-connected",
  WindowsDisconnected = "windows-disconnected",
  WindowsStopped = "windows-stopped",
  LinuxConnected = "linux-connected",
  LinuxDisconnected = "linux-disconnected",
  LinuxStopped = "linux-stopped",
}
