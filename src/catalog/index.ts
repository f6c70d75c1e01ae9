/**
 * Service catalog module
 *
 * Loading, validation and lookup of the service registry (catalog.yaml).
 */

// Types
export type {
  CatalogEntry,
  CatalogValidationResult,
  RawCatalogEntry,
  RawCatalogFile,
} from "./types";

// Validators
export type { DirectoryCheck } from "./validation";
export {
  validateNotEmpty,
  validateServiceName,
  validateServiceType,
  validateServicePath,
  findDuplicateNames,
  validateCatalogEntries,
} from "./validation";

// Loader
export {
  checkCatalogSchema,
  getCatalogPath,
  validateCatalog,
  loadCatalog,
  findService,
  filterByProvider,
} from "./loader";
