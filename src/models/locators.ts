import { Data, type Require as Enforced } from "dataclass";

/**
 * Immutable identities of the resources shown in the explorer. Two locators for the same
 * resource are `.equals()` even when they are different objects; their string forms are the
 * resource paths used as map keys. `resourceType` tells the three apart.
 */
export class ProjectLocator extends Data {
  projectId!: Enforced<string>;

  get resourceType(): "project" {
    return "project";
  }

  get name(): string {
    return this.projectId;
  }

  toString(): string {
    return `projects/${this.projectId}`;
  }
}

export class ZoneLocator extends Data {
  projectId!: Enforced<string>;
  name!: Enforced<string>;

  get resourceType(): "zone" {
    return "zone";
  }

  get project(): ProjectLocator {
    return ProjectLocator.create({ projectId: this.projectId });
  }

  toString(): string {
    return `projects/${this.projectId}/zones/${this.name}`;
  }
}

export class InstanceLocator extends Data {
  projectId!: Enforced<string>;
  zone!: Enforced<string>;
  name!: Enforced<string>;

  get resourceType(): "instance" {
    return "instance";
  }

  get project(): ProjectLocator {
    return ProjectLocator.create({ projectId: this.projectId });
  }

  get zoneLocator(): ZoneLocator {
    return ZoneLocator.create({ projectId: this.projectId, name: this.zone });
  }

  toString(): string {
    return `projects/${this.projectId}/zones/${this.zone}/instances/${this.name}`;
  }
}

export type ResourceLocator = ProjectLocator | ZoneLocator | InstanceLocator;
