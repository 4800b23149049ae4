/**
 * Shapes returned by the remote inventory APIs, limited to the fields the explorer reads.
 * Adapters translate their API client's responses into these.
 */

/** Project metadata from the resource manager API. */
export interface ProjectMetadata {
  projectId: string;
  /** Human-readable name; may equal the id. */
  name: string;
}

export interface GuestOsFeature {
  type: string;
}

export interface AttachedDisk {
  guestOsFeatures?: GuestOsFeature[];
}

/** A compute instance as listed by the compute API. */
export interface ComputeInstance {
  id: string;
  name: string;
  /** Zone name, or the zone's resource URL (`.../projects/<p>/zones/<zone>`). */
  zone: string;
  /** e.g. `RUNNING`, `TERMINATED`, `STOPPING`. */
  status?: string;
  disks?: AttachedDisk[];
}

/**
 * Remote inventory access. Implementations should honor the `signal` and reject with an
 * `AccessDeniedError` when the caller may not read a project.
 */
export interface InventoryAdapter {
  getProject(projectId: string, signal?: AbortSignal): Promise<ProjectMetadata>;
  listInstances(projectId: string, signal?: AbortSignal): Promise<ComputeInstance[]>;
}
