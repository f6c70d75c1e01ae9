/**
 * Service catalog types
 *
 * The catalog (catalog.yaml) registers every service that CAN be deployed:
 * its name, directory, provider and type.
 */

import { ServiceType } from "../constants";
import { CatalogProblem } from "../errors";

// =============================================================================
// Raw Catalog Types (as read from catalog.yaml, after schema validation)
// =============================================================================

/**
 * Catalog entry as written in catalog.yaml
 *
 * `provider` and `description` are optional and defaulted on load.
 */
export interface RawCatalogEntry {
  readonly name: string;
  readonly path: string;
  readonly provider?: string;
  readonly type: string;
  readonly description?: string;
}

/**
 * catalog.yaml file schema
 */
export interface RawCatalogFile {
  readonly services: readonly RawCatalogEntry[];
}

// =============================================================================
// Loaded Catalog Types
// =============================================================================

/**
 * A service registered in the catalog
 */
export interface CatalogEntry {
  /** Unique service name (the command-line lookup key) */
  readonly name: string;
  /** Service directory, relative to the repository root */
  readonly path: string;
  /** Cloud provider; selects the global config directory */
  readonly provider: string;
  /** Documentation only, no effect on resolution */
  readonly type: ServiceType;
  /** Free-form description ("" when omitted) */
  readonly description: string;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Catalog validation result
 */
export type CatalogValidationResult =
  | { readonly valid: true; readonly entries: readonly CatalogEntry[] }
  | { readonly valid: false; readonly errors: readonly CatalogProblem[] };
