/**
 * Service catalog loader
 *
 * Reads catalog.yaml from the repository root, checks it against the JSON
 * Schema, applies the catalog rules and exposes lookup helpers.
 */

import Ajv2020, { Schema, ValidateFunction } from "ajv/dist/2020";
import * as fs from "fs";
import * as path from "path";
import { CATALOG_FILE } from "../constants";
import { CatalogError, CatalogProblem, ConfigParseError, ServiceNotFoundError } from "../errors";
import { readYamlFile } from "../yaml-file";
import { CatalogEntry, CatalogValidationResult, RawCatalogFile } from "./types";
import { DirectoryCheck, validateCatalogEntries } from "./validation";

// ============================================================================
// Schema validation
// ============================================================================

/** Path to the catalog JSON Schema */
const SCHEMA_PATH = path.resolve(__dirname, "../../schema/catalog.schema.json");

/** Cached Ajv validator instance */
let cachedValidator: ValidateFunction<RawCatalogFile> | null = null;

/**
 * Get or create the catalog schema validator
 */
function getSchemaValidator(): ValidateFunction<RawCatalogFile> {
  if (cachedValidator) {
    return cachedValidator;
  }

  const schemaContent = fs.readFileSync(SCHEMA_PATH, "utf-8");
  const schema = JSON.parse(schemaContent) as Schema;

  const ajv = new Ajv2020({
    allErrors: true, // Collect all errors, not just the first
  });

  cachedValidator = ajv.compile<RawCatalogFile>(schema);
  return cachedValidator;
}

/**
 * Check a parsed catalog document against the JSON Schema
 *
 * @returns Schema problems (empty when the document is valid)
 */
export function checkCatalogSchema(document: unknown): CatalogProblem[] {
  const validate = getSchemaValidator();
  if (validate(document)) {
    return [];
  }
  return (validate.errors ?? []).map((err) => {
    const location = err.instancePath || "(root)";
    return {
      code: "SCHEMA_VIOLATION",
      message: `${location}: ${err.message ?? "unknown error"}`,
      path: location,
    };
  });
}

// ============================================================================
// Loading
// ============================================================================

const isDirectory: DirectoryCheck = (absolutePath) =>
  fs.existsSync(absolutePath) && fs.statSync(absolutePath).isDirectory();

/**
 * Get the catalog file path for a repository root
 */
export function getCatalogPath(rootDir: string): string {
  return path.join(rootDir, CATALOG_FILE);
}

/**
 * Read and validate the catalog without throwing on invalid content
 *
 * Missing, unparseable and invalid catalogs are all reported as problems.
 */
export function validateCatalog(rootDir: string): CatalogValidationResult {
  const catalogPath = getCatalogPath(rootDir);

  let document: unknown;
  try {
    document = readYamlFile(catalogPath);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return {
        valid: false,
        errors: [{ code: "CATALOG_PARSE_ERROR", message: error.parseError }],
      };
    }
    throw error;
  }

  if (document === undefined) {
    return {
      valid: false,
      errors: [{ code: "CATALOG_NOT_FOUND", message: `Catalog file not found: ${catalogPath}` }],
    };
  }

  const validate = getSchemaValidator();
  if (!validate(document)) {
    return { valid: false, errors: checkCatalogSchema(document) };
  }

  return validateCatalogEntries(document.services, rootDir, isDirectory);
}

/**
 * Load the catalog, failing fast on any problem
 *
 * @throws CatalogError listing every problem found
 */
export function loadCatalog(rootDir: string): readonly CatalogEntry[] {
  const result = validateCatalog(rootDir);
  if (!result.valid) {
    throw new CatalogError(getCatalogPath(rootDir), result.errors);
  }
  return result.entries;
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Find a service by name
 *
 * @throws ServiceNotFoundError naming the service and the available ones
 */
export function findService(catalog: readonly CatalogEntry[], name: string): CatalogEntry {
  const entry = catalog.find((e) => e.name === name);
  if (!entry) {
    throw new ServiceNotFoundError(
      name,
      catalog.map((e) => e.name)
    );
  }
  return entry;
}

/**
 * Restrict the catalog to one provider (all entries when none is given)
 */
export function filterByProvider(
  catalog: readonly CatalogEntry[],
  provider?: string
): readonly CatalogEntry[] {
  if (provider === undefined) {
    return catalog;
  }
  return catalog.filter((e) => e.provider === provider);
}
