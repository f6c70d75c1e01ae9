/**
 * Centralized constants and validation patterns
 *
 * Single source of truth for:
 * - Reserved config keys and file names
 * - Slug validation patterns
 * - Process exit codes
 */

// ============================================================================
// Reserved Keys
// ============================================================================

/**
 * Global config key holding the broadcast block
 *
 * Its entries are distributed into every service of the provider.
 * The key itself never reaches a generated stack file.
 */
export const PROJECT_CONFIG_KEY = "projectConfig";

/** Service argument that selects every catalog entry */
export const FLEET_TARGET = "all";

/** Action run when none is given on the command line */
export const DEFAULT_ACTION = "preview";

/** Provider assumed for catalog entries that do not name one */
export const DEFAULT_PROVIDER = "azure";

/** External provisioning tool binary (overridable with STACKCFG_TOOL) */
export const DEFAULT_TOOL = "pulumi";

// ============================================================================
// Service Types
// ============================================================================

/** Service types accepted in the catalog (documentation only) */
export const SERVICE_TYPES = ["stateless", "stateful"] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

/**
 * Check if a value is a known service type
 */
export function isServiceType(value: string): value is ServiceType {
  return SERVICE_TYPES.some((type) => type === value);
}

// ============================================================================
// File Layout
// ============================================================================

/** Service registry, relative to the repository root */
export const CATALOG_FILE = "catalog.yaml";

/** Directory holding one global config directory per provider */
export const GLOBAL_CONFIG_DIR = ["services", "config"] as const;

/** Pulumi project file inside each service directory */
export const PROJECT_FILE = "Pulumi.yaml";

/** File name of a stack config (global and generated) */
export function stackFileName(stack: string): string {
  return `Pulumi.${stack}.yaml`;
}

/** File name of a service override */
export function overrideFileName(stack: string): string {
  return `override.Pulumi.${stack}.yaml`;
}

// ============================================================================
// Slug Validation
// ============================================================================

/**
 * Slug pattern: lowercase alphanumeric with hyphens
 * Cannot start with a digit or hyphen, cannot end with hyphen
 */
export const SLUG_PATTERN = /^[a-z][a-z0-9-]*[a-z0-9]$|^[a-z]$/;

/**
 * Check if a value is a valid slug
 *
 * Examples:
 * - "az-app1" -> valid
 * - "dev" -> valid
 * - "2fast" -> invalid (starts with number)
 * - "App" -> invalid (uppercase)
 * - "app-" -> invalid (ends with hyphen)
 */
export function isValidSlug(value: string): boolean {
  if (!value || value.length === 0) return false;
  return SLUG_PATTERN.test(value);
}

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_SUCCESS = 0;
/** A service failed or the external tool exited non-zero */
export const EXIT_FAILURE = 1;
/** Catalog, config or usage error; nothing was executed */
export const EXIT_CONFIG_ERROR = 2;
/** Run stopped by SIGINT/SIGTERM (128 + SIGINT) */
export const EXIT_INTERRUPTED = 130;
