/** Key/value persistence for user settings, keyed by full setting id. */
export interface SettingsStore {
  get(id: string): unknown;
  update(id: string, value: unknown): Promise<void>;
}

/** {@link SettingsStore} that lives as long as the process. */
export class InMemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [id, value] of Object.entries(initial)) {
      this.values.set(id, value);
    }
  }

  get(id: string): unknown {
    return this.values.get(id);
  }

  async update(id: string, value: unknown): Promise<void> {
    if (value === undefined) {
      this.values.delete(id);
    } else {
      this.values.set(id, value);
    }
  }
}
