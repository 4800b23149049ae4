import { ExplorerNode, InstanceNode, NodeKind, OperatingSystems } from "../models/nodes";

/** What the explorer currently shows. Only instances are subject to filtering. */
export interface FilterState {
  operatingSystems: OperatingSystems;
  /** Case-insensitive substring of the instance name; unset or empty matches everything. */
  instanceNamePattern?: string;
}

export const DEFAULT_FILTER: FilterState = Object.freeze({
  operatingSystems: OperatingSystems.All,
});

/** Check if an instance passes the OS and name filters. */
export function instanceMatchesFilter(instance: InstanceNode, filter: FilterState): boolean {
  if ((filter.operatingSystems & instance.operatingSystem) === 0) {
    return false;
  }
  const pattern = filter.instanceNamePattern;
  if (!pattern) {
    return true;
  }
  return instance.displayText.toLowerCase().includes(pattern.toLowerCase());
}

/** Projects, zones (and the root) always stay visible, even with no matching descendants. */
export function isVisible(node: ExplorerNode, filter: FilterState): boolean {
  return node.kind !== NodeKind.Instance || instanceMatchesFilter(node, filter);
}

/** Filter a node's raw children, preserving their order. Never fetches anything. */
export function applyFilter<T extends ExplorerNode>(
  rawChildren: readonly T[],
  filter: FilterState,
): T[] {
  return rawChildren.filter((node) => isVisible(node, filter));
}

export function filtersEqual(a: FilterState, b: FilterState): boolean {
  return (
    a.operatingSystems === b.operatingSystems &&
    (a.instanceNamePattern || undefined) === (b.instanceNamePattern || undefined)
  );
}
