/**
 * Layer merging
 *
 * Pure functions that combine config layers into the resolved config.
 * Precedence, low to high: global (without projectConfig), then the
 * projectConfig broadcast block, then the service override.
 *
 * Inputs are never mutated; the result shares unchanged subtrees with them.
 */

import { PROJECT_CONFIG_KEY } from "../constants";
import { ConfigMapping, ConfigTree, EMPTY_MAPPING, isConfigMapping } from "../types";

/**
 * Merge two config trees, `higher` taking precedence
 *
 * - mapping × mapping: recursive merge
 * - anything else (sequences included): `higher` replaces `lower` wholesale
 */
export function mergeTrees(lower: ConfigTree, higher: ConfigTree): ConfigTree {
  if (isConfigMapping(lower) && isConfigMapping(higher)) {
    return deepMerge(lower, higher);
  }
  return higher;
}

/**
 * Recursively merge `higher` into `lower`
 *
 * Keys keep `lower`'s order; keys only in `higher` are appended in its order.
 */
export function deepMerge(lower: ConfigMapping, higher: ConfigMapping): ConfigMapping {
  const out = new Map(lower);
  for (const [key, value] of higher) {
    const existing = out.get(key);
    out.set(key, existing === undefined ? value : mergeTrees(existing, value));
  }
  return out;
}

/**
 * Copy of a mapping without the reserved projectConfig key
 */
export function withoutProjectConfig(config: ConfigMapping): ConfigMapping {
  if (!config.has(PROJECT_CONFIG_KEY)) {
    return config;
  }
  const rest = new Map(config);
  rest.delete(PROJECT_CONFIG_KEY);
  return rest;
}

/**
 * The broadcast block of a global config (empty when absent or null)
 */
export function broadcastBlock(global: ConfigMapping): ConfigMapping {
  const broadcast = global.get(PROJECT_CONFIG_KEY);
  return broadcast !== undefined && isConfigMapping(broadcast) ? broadcast : EMPTY_MAPPING;
}

/**
 * Input layers for one service
 */
export interface ConfigLayers {
  /** Global config, projectConfig included */
  readonly global: ConfigMapping;
  /** Service override (empty mapping when absent) */
  readonly override: ConfigMapping;
}

/**
 * Resolve the effective config of a service
 *
 * The projectConfig key never appears in the result, even when an override
 * declares one.
 */
export function resolveConfig(layers: ConfigLayers): ConfigMapping {
  const base = withoutProjectConfig(layers.global);
  const withBroadcast = deepMerge(base, broadcastBlock(layers.global));
  return deepMerge(withBroadcast, withoutProjectConfig(layers.override));
}

/**
 * Top-level keys defined both as ordinary global keys and in projectConfig
 *
 * The broadcast value wins on such keys; callers report them as warnings.
 */
export function findBroadcastCollisions(global: ConfigMapping): string[] {
  const base = withoutProjectConfig(global);
  return [...broadcastBlock(global).keys()].filter((key) => base.has(key));
}
