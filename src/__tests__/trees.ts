/**
 * Config tree builders for tests
 */

import { ConfigMapping, isConfigMapping, toConfigTree } from "../types";

/**
 * Build a config mapping from an object literal, nested objects included
 *
 * Object key order applies; build a Map directly to test integer-like keys.
 */
export function mapping(value: Record<string, unknown>): ConfigMapping {
  const converted = toConfigTree(value);
  if (!converted.ok || !isConfigMapping(converted.tree)) {
    throw new Error("test mapping is not a config mapping");
  }
  return converted.tree;
}
