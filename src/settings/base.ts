import type { SettingsStore } from "./store";

/**
 * A typed user setting with a default, read from and written to a {@link SettingsStore}.
 *
 * Stored values failing the setting's type check are ignored in favor of the default.
 */
export class Setting<T> {
  constructor(
    /**
     * The full setting ID.
     * @example "explorer.includeWindowsInstances"
     */
    public readonly id: string,
    public readonly defaultValue: T,
    private readonly isValid: (value: unknown) => value is T,
  ) {}

  /** Get the stored value of this setting, or its default. */
  value(store: SettingsStore): T {
    const stored = store.get(this.id);
    return this.isValid(stored) ? stored : this.defaultValue;
  }

  async update(store: SettingsStore, value: T): Promise<void> {
    await store.update(this.id, value);
  }
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}
