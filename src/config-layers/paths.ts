/**
 * Config file locations
 *
 * Global:    <root>/services/config/<provider>/Pulumi.<stack>.yaml
 * Override:  <service>/override.Pulumi.<stack>.yaml
 * Generated: <service>/Pulumi.<stack>.yaml (DO NOT EDIT)
 */

import * as path from "path";
import {
  GLOBAL_CONFIG_DIR,
  PROJECT_FILE,
  overrideFileName,
  stackFileName,
} from "../constants";
import { CatalogEntry } from "../catalog";

/**
 * Get path to global config for a provider and stack
 */
export function globalConfigPath(rootDir: string, provider: string, stack: string): string {
  return path.join(rootDir, ...GLOBAL_CONFIG_DIR, provider, stackFileName(stack));
}

/**
 * Get the absolute directory of a catalog entry
 */
export function serviceDirectory(rootDir: string, entry: CatalogEntry): string {
  return path.resolve(rootDir, entry.path);
}

/**
 * Get path to a service-specific override file
 */
export function overridePath(serviceDir: string, stack: string): string {
  return path.join(serviceDir, overrideFileName(stack));
}

/**
 * Get path to the generated stack file
 */
export function stackFilePath(serviceDir: string, stack: string): string {
  return path.join(serviceDir, stackFileName(stack));
}

/**
 * Get path to the service's Pulumi project file
 */
export function projectFilePath(serviceDir: string): string {
  return path.join(serviceDir, PROJECT_FILE);
}
