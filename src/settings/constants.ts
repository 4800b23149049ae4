import { isBoolean, Setting } from "./base";

// ===== EXPLORER FILTER =====

/** Whether Windows instances are shown in the explorer. */
export const INCLUDE_WINDOWS_INSTANCES = new Setting<boolean>(
  "explorer.includeWindowsInstances",
  true,
  isBoolean,
);

/** Whether Linux instances are shown in the explorer. */
export const INCLUDE_LINUX_INSTANCES = new Setting<boolean>(
  "explorer.includeLinuxInstances",
  true,
  isBoolean,
);
