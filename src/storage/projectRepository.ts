import { Mutex } from "async-mutex";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { Logger } from "../logging";

const logger = new Logger("storage.projectRepository");

/** The persisted set of project ids the user chose to show in the explorer. */
export interface ProjectRepository {
  /** Tracked project ids, in the order they were added. */
  listProjects(): Promise<string[]>;
  /** @returns false if the project was already tracked */
  addProject(projectId: string): Promise<boolean>;
  /** @returns false if the project was not tracked */
  removeProject(projectId: string): Promise<boolean>;
}

/**
 * Base for repositories whose read-modify-write cycles must not interleave. Subclasses provide
 * raw load/store of the id list.
 */
abstract class MutexGuardedProjectRepository implements ProjectRepository {
  private readonly mutex = new Mutex();

  protected abstract load(): Promise<string[]>;
  protected abstract store(projectIds: string[]): Promise<void>;

  async listProjects(): Promise<string[]> {
    return await this.runWithMutex(async () => [...(await this.load())]);
  }

  async addProject(projectId: string): Promise<boolean> {
    return await this.runWithMutex(async () => {
      const projectIds = await this.load();
      if (projectIds.includes(projectId)) {
        logger.debug(`project ${projectId} is already tracked`);
        return false;
      }
      await this.store([...projectIds, projectId]);
      logger.debug(`added project ${projectId}`);
      return true;
    });
  }

  async removeProject(projectId: string): Promise<boolean> {
    return await this.runWithMutex(async () => {
      const projectIds = await this.load();
      if (!projectIds.includes(projectId)) {
        logger.debug(`project ${projectId} is not tracked`);
        return false;
      }
      await this.store(projectIds.filter((id) => id !== projectId));
      logger.debug(`removed project ${projectId}`);
      return true;
    });
  }

  /**
   * Run an async callback with exclusive access to the stored list, so that concurrent add/remove
   * calls cannot lose each other's writes.
   */
  private async runWithMutex<T>(callback: () => Promise<T>): Promise<T> {
    return await this.mutex.runExclusive(callback);
  }
}

/** Keeps tracked project ids in memory only. */
export class InMemoryProjectRepository extends MutexGuardedProjectRepository {
  private projectIds: string[];

  constructor(initialProjectIds: string[] = []) {
    super();
    this.projectIds = [...new Set(initialProjectIds)];
  }

  protected async load(): Promise<string[]> {
    return this.projectIds;
  }

  protected async store(projectIds: string[]): Promise<void> {
    this.projectIds = projectIds;
  }
}

/** Keeps tracked project ids as a JSON array in a file, created on first write. */
export class JsonFileProjectRepository extends MutexGuardedProjectRepository {
  constructor(private readonly path: string) {
    super();
  }

  protected async load(): Promise<string[]> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isFileNotFound(error)) {
        return [];
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(contents);
    if (!Array.isArray(parsed) || !parsed.every((id): id is string => typeof id === "string")) {
      throw new Error(`${this.path} does not contain a JSON array of project ids`);
    }
    return parsed;
  }

  protected async store(projectIds: string[]): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(projectIds, null, 2), "utf-8");
  }
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
