/**
 * Config layer reader
 *
 * Loads the provider-wide global config and the optional service override
 * for a stack, plus the project name from the service's Pulumi.yaml.
 */

import { PROJECT_CONFIG_KEY } from "../constants";
import {
  ConfigParseError,
  MissingGlobalConfigError,
  ProjectFileError,
} from "../errors";
import { ConfigMapping, EMPTY_MAPPING, isConfigMapping } from "../types";
import { readConfigMapping, readYamlFile } from "../yaml-file";
import { globalConfigPath, overridePath, projectFilePath } from "./paths";

/**
 * Global config for a (provider, stack)
 *
 * Ordinary keys plus an optional `projectConfig` mapping broadcast to every
 * service of the provider.
 */
export type GlobalConfig = ConfigMapping;

/**
 * Service override for a (service, stack); empty when the file is absent
 */
export type ServiceOverride = ConfigMapping;

/**
 * Read the global config layer
 *
 * A provider/stack combination must have explicit global config; it is
 * never defaulted.
 *
 * @throws MissingGlobalConfigError if the file does not exist
 * @throws ConfigParseError if the file is malformed or projectConfig is not a mapping
 */
export function readGlobal(rootDir: string, provider: string, stack: string): GlobalConfig {
  const filePath = globalConfigPath(rootDir, provider, stack);
  const config = readConfigMapping(filePath);

  if (config === undefined) {
    throw new MissingGlobalConfigError(provider, stack, filePath);
  }

  const broadcast = config.get(PROJECT_CONFIG_KEY);
  if (broadcast !== undefined && broadcast !== null && !isConfigMapping(broadcast)) {
    throw new ConfigParseError(filePath, `'${PROJECT_CONFIG_KEY}' must be a mapping`);
  }

  return config;
}

/**
 * Read the service override layer
 *
 * Overrides are optional: a missing file is an empty mapping.
 *
 * @throws ConfigParseError if the file exists but is malformed
 */
export function readOverride(serviceDir: string, stack: string): ServiceOverride {
  return readConfigMapping(overridePath(serviceDir, stack)) ?? EMPTY_MAPPING;
}

/**
 * Read 'name:' from <serviceDir>/Pulumi.yaml
 *
 * The name namespaces every generated config key, so it may not contain ':'.
 *
 * @throws ProjectFileError if the file is missing or has no usable name
 */
export function readProjectName(serviceDir: string): string {
  const filePath = projectFilePath(serviceDir);
  const project = readYamlFile(filePath);

  if (project === undefined) {
    throw new ProjectFileError(filePath, "Pulumi project file not found");
  }
  if (project === null || typeof project !== "object" || Array.isArray(project)) {
    throw new ProjectFileError(filePath, "Pulumi project file is not a mapping");
  }

  const name: unknown = "name" in project ? project.name : undefined;
  if (typeof name !== "string" || name.trim() === "") {
    throw new ProjectFileError(filePath, "Pulumi project file is missing 'name:'");
  }
  if (name.includes(":")) {
    throw new ProjectFileError(filePath, `Invalid project name "${name}" (must not contain ':')`);
  }

  return name;
}
