import type { ComputeInstance } from "../clients/inventory";
import { WINDOWS_GUEST_OS_FEATURE } from "../constants";
import { CancelledOperationError } from "../errors";
import { OperatingSystems } from "../models/nodes";

/**
 * Internal functions used by the NodeLoader.
 *
 * Factored out from nodeLoader.ts to allow for test suite mocking / stubbing.
 */

/**
 * Zone name of an instance record. The compute API reports the zone as a resource URL
 * (`https://.../projects/<p>/zones/<zone>`); a bare name is returned unchanged.
 */
export function zoneNameFromUrl(zone: string): string {
  const trimmed = zone.replace(/\/+$/, "");
  const lastSlash = trimmed.lastIndexOf("/");
  return lastSlash === -1 ? trimmed : trimmed.substring(lastSlash + 1);
}

/** Windows if any attached disk advertises the `WINDOWS` guest OS feature, otherwise Linux. */
export function detectOperatingSystem(
  instance: ComputeInstance,
): OperatingSystems.Windows | OperatingSystems.Linux {
  const isWindows = (instance.disks ?? []).some((disk) =>
    (disk.guestOsFeatures ?? []).some((feature) => feature.type === WINDOWS_GUEST_OS_FEATURE),
  );
  return isWindows ? OperatingSystems.Windows : OperatingSystems.Linux;
}

/** Case-sensitive ordinal comparison (UTF-16 code units), independent of the host locale. */
export function compareOrdinal(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Group instance records by zone name. Zones come out in ordinal order; instances keep the order
 * the API returned them in.
 */
export function groupInstancesByZone(
  instances: ComputeInstance[],
): Map<string, ComputeInstance[]> {
  const byZone = new Map<string, ComputeInstance[]>();
  for (const instance of instances) {
    const zone = zoneNameFromUrl(instance.zone);
    const existing = byZone.get(zone);
    if (existing) {
      existing.push(instance);
    } else {
      byZone.set(zone, [instance]);
    }
  }
  const sortedZones = [...byZone.keys()].sort(compareOrdinal);
  return new Map(
    sortedZones.map((zone): [string, ComputeInstance[]] => [zone, byZone.get(zone) ?? []]),
  );
}

/** Throw a {@link CancelledOperationError} if the signal has been aborted. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledOperationError();
  }
}

/**
 * Race a promise against the signal's abort. The underlying work is not stopped, only the caller
 * is released.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledOperationError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledOperationError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
