import type { TaskHeader } from "../contracts.js";
import type { CapabilityFilter } from "./task-header-registry.js";

/** Numeric dotted comparison; missing segments count as 0, non-numeric ones as 0. */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map((part) => Number.parseInt(part, 10) || 0);
  const right = b.split(".").map((part) => Number.parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function createEnvironmentFilter(options: {
  environments: string[];
  nodeVersion: string;
}): CapabilityFilter {
  const environments = new Set(options.environments);
  return {
    supports(header: TaskHeader) {
      if (!environments.has(header.environment)) return false;
      if (header.minVersion && compareVersions(options.nodeVersion, header.minVersion) < 0) {
        return false;
      }
      return true;
    },
  };
}
