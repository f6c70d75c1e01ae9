/**
 * Catalog validation rules
 *
 * Runs after the JSON Schema check, on entries whose shape is already known.
 * Every rule returns its problem instead of throwing so that a single pass
 * reports all of them.
 */

import * as path from "path";
import { DEFAULT_PROVIDER, SERVICE_TYPES, isServiceType, isValidSlug } from "../constants";
import { CatalogProblem } from "../errors";
import { CatalogEntry, CatalogValidationResult, RawCatalogEntry } from "./types";

/** Predicate used to check service directories */
export type DirectoryCheck = (absolutePath: string) => boolean;

// =============================================================================
// Individual Validation Functions
// =============================================================================

/**
 * Rule 1: Catalog must register at least one service
 */
export function validateNotEmpty(entries: readonly RawCatalogEntry[]): CatalogProblem | null {
  if (entries.length > 0) {
    return null;
  }
  return {
    code: "EMPTY_CATALOG",
    message: "Catalog registers no services",
    path: "services",
  };
}

/**
 * Rule 2: Service name must be a slug
 */
export function validateServiceName(name: string, index: number): CatalogProblem | null {
  if (isValidSlug(name)) {
    return null;
  }
  return {
    code: "INVALID_SERVICE_NAME",
    message: `Invalid service name "${name}": must start with lowercase letter and contain only lowercase letters, numbers, and hyphens`,
    path: `services[${String(index)}].name`,
  };
}

/**
 * Rule 3: Service type must be stateless or stateful
 */
export function validateServiceType(
  type: string,
  name: string,
  index: number
): CatalogProblem | null {
  if (isServiceType(type)) {
    return null;
  }
  return {
    code: "INVALID_SERVICE_TYPE",
    message: `Service "${name}" has invalid type "${type}" (must be one of: ${SERVICE_TYPES.join(", ")})`,
    path: `services[${String(index)}].type`,
  };
}

/**
 * Rules 4-5: Service path must stay inside the root and be a directory
 */
export function validateServicePath(
  servicePath: string,
  name: string,
  index: number,
  rootDir: string,
  isDirectory: DirectoryCheck
): CatalogProblem | null {
  const root = path.resolve(rootDir);
  const absolute = path.resolve(root, servicePath);
  const relative = path.relative(root, absolute);

  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return {
      code: "SERVICE_PATH_OUTSIDE_ROOT",
      message: `Service "${name}" path "${servicePath}" points outside the repository root`,
      path: `services[${String(index)}].path`,
    };
  }

  if (!isDirectory(absolute)) {
    return {
      code: "SERVICE_PATH_NOT_FOUND",
      message: `Service "${name}" path not found: ${servicePath}`,
      path: `services[${String(index)}].path`,
    };
  }

  return null;
}

/**
 * Rule 6: Service names must be unique
 */
export function findDuplicateNames(entries: readonly RawCatalogEntry[]): CatalogProblem[] {
  const positions = new Map<string, number[]>();
  entries.forEach((entry, index) => {
    const existing = positions.get(entry.name) ?? [];
    existing.push(index);
    positions.set(entry.name, existing);
  });

  const problems: CatalogProblem[] = [];
  for (const [name, indexes] of positions) {
    if (indexes.length > 1) {
      problems.push({
        code: "DUPLICATE_SERVICE_NAME",
        message: `Duplicate service name "${name}" at entries ${indexes.join(", ")}. Each service must have a unique name.`,
        path: "services",
      });
    }
  }
  return problems;
}

// =============================================================================
// Main Validation Function
// =============================================================================

/**
 * Validate raw catalog entries and build loaded entries
 *
 * Runs all rules and collects all problems. Entries come back in file order.
 *
 * @param entries - Schema-valid entries from catalog.yaml
 * @param rootDir - Repository root that entry paths are relative to
 * @param isDirectory - Directory existence check
 */
export function validateCatalogEntries(
  entries: readonly RawCatalogEntry[],
  rootDir: string,
  isDirectory: DirectoryCheck
): CatalogValidationResult {
  const errors: CatalogProblem[] = [];
  const loaded: CatalogEntry[] = [];

  const emptyError = validateNotEmpty(entries);
  if (emptyError) errors.push(emptyError);

  entries.forEach((raw, index) => {
    const entryErrors = [
      validateServiceName(raw.name, index),
      validateServiceType(raw.type, raw.name, index),
      validateServicePath(raw.path, raw.name, index, rootDir, isDirectory),
    ].filter((e): e is CatalogProblem => e !== null);

    errors.push(...entryErrors);

    if (entryErrors.length === 0 && isServiceType(raw.type)) {
      loaded.push({
        name: raw.name,
        path: raw.path,
        provider: raw.provider ?? DEFAULT_PROVIDER,
        type: raw.type,
        description: raw.description ?? "",
      });
    }
  });

  errors.push(...findDuplicateNames(entries));

  if (errors.length === 0) {
    return { valid: true, entries: loaded };
  }
  return { valid: false, errors };
}
