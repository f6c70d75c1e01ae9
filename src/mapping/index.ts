/**
 * Config key mapping
 *
 * Namespaces the resolved config into Pulumi config keys:
 * every top-level key `k` becomes `<project>:k`. Nested values keep their
 * shape so that Pulumi reads them as structured config.
 */

import { PROJECT_CONFIG_KEY } from "../constants";
import { ConfigMapping, ConfigTree } from "../types";

/**
 * Namespaced config, in resolved key order
 */
export type MappedConfig = ReadonlyMap<string, ConfigTree>;

/**
 * Build a namespaced config key
 */
export function namespacedKey(projectName: string, key: string): string {
  return `${projectName}:${key}`;
}

/**
 * Map resolved config to Pulumi config keys
 *
 * Distinct resolved keys always yield distinct namespaced keys.
 */
export function flattenConfig(resolved: ConfigMapping, projectName: string): MappedConfig {
  const mapped = new Map<string, ConfigTree>();
  for (const [key, value] of resolved) {
    if (key === PROJECT_CONFIG_KEY) continue;
    mapped.set(namespacedKey(projectName, key), value);
  }
  return mapped;
}
