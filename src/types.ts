/**
 * Config tree model
 *
 * Config layers have no fixed schema across providers and services, so every
 * layer is held as a ConfigTree: a scalar, a sequence, or a mapping of string
 * keys to further trees. The merge and mapping steps are defined over this
 * union only.
 *
 * Mappings are Maps so that every key, integer-like ones included, keeps
 * its file order.
 */

/** Leaf value; integers beyond the safe range stay bigint */
export type ConfigScalar = string | number | bigint | boolean | null;

/** Ordered sequence, replaced wholesale on merge */
export type ConfigSequence = readonly ConfigTree[];

/** String-keyed mapping in insertion order, merged recursively */
export type ConfigMapping = ReadonlyMap<string, ConfigTree>;

export type ConfigTree = ConfigScalar | ConfigSequence | ConfigMapping;

/** Empty mapping (a missing override is equivalent to this) */
export const EMPTY_MAPPING: ConfigMapping = new Map<string, ConfigTree>();

/**
 * Check if a config tree is a mapping
 */
export function isConfigMapping(value: ConfigTree): value is ConfigMapping {
  return value instanceof Map;
}

/**
 * Check if a config tree is a sequence
 */
export function isConfigSequence(value: ConfigTree): value is ConfigSequence {
  return Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Result of converting parsed YAML into a config tree
 */
export type ConfigTreeConversion =
  | { readonly ok: true; readonly tree: ConfigTree }
  | { readonly ok: false; readonly path: string; readonly reason: string };

function mappingKey(key: unknown): string | undefined {
  if (typeof key === "string") return key;
  if (
    key === null ||
    typeof key === "number" ||
    typeof key === "bigint" ||
    typeof key === "boolean"
  ) {
    return String(key);
  }
  return undefined;
}

function convertEntries(
  entries: Iterable<[unknown, unknown]>,
  path: string
): ConfigTreeConversion {
  const mapping = new Map<string, ConfigTree>();
  for (const [rawKey, child] of entries) {
    const key = mappingKey(rawKey);
    if (key === undefined) {
      return { ok: false, path, reason: "mapping key is not a scalar" };
    }
    const converted = toConfigTree(child, path === "(root)" ? key : `${path}.${key}`);
    if (!converted.ok) return converted;
    mapping.set(key, converted.tree);
  }
  return { ok: true, tree: mapping };
}

/**
 * Convert a parsed YAML value into a ConfigTree
 *
 * Accepts Maps (document order) and plain objects. Integers come back as
 * numbers when they are safe integers, as bigint otherwise. Rejects values
 * with no config tree equivalent (functions, dates, binary, non-finite
 * numbers) and reports the dotted path of the first offender.
 */
export function toConfigTree(value: unknown, path = "(root)"): ConfigTreeConversion {
  if (value === null || value === undefined) {
    return { ok: true, tree: null };
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return { ok: true, tree: value };
  }
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return { ok: true, tree: Number.isSafeInteger(asNumber) ? asNumber : value };
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return { ok: false, path, reason: `non-finite number ${String(value)}` };
    }
    return { ok: true, tree: value };
  }
  if (Array.isArray(value)) {
    const items: ConfigTree[] = [];
    for (let i = 0; i < value.length; i++) {
      const item = toConfigTree(value[i], `${path}[${String(i)}]`);
      if (!item.ok) return item;
      items.push(item.tree);
    }
    return { ok: true, tree: items };
  }
  if (value instanceof Map) {
    return convertEntries(value.entries(), path);
  }
  if (isPlainObject(value)) {
    return convertEntries(Object.entries(value), path);
  }
  return { ok: false, path, reason: `unsupported value of type ${typeof value}` };
}
