/**
 * YAML file reading shared by the catalog and config layer readers
 *
 * Files are parsed with the YAML 1.2 core schema: timestamps and binary
 * tags stay plain scalars. Config layers go through the `yaml` parser,
 * which keeps mappings in document order and integers exact.
 */

import * as fs from "fs";
import * as jsYaml from "js-yaml";
import * as yaml from "yaml";
import { ConfigParseError, errorMessage } from "./errors";
import { ConfigMapping, EMPTY_MAPPING, isConfigMapping, toConfigTree } from "./types";

/**
 * Read a file, or undefined when it does not exist
 *
 * @throws ConfigParseError if the file exists but cannot be read
 */
function readSource(filePath: string): string | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigParseError(filePath, errorMessage(error));
  }
}

/**
 * Read and parse a YAML file
 *
 * @returns Parsed document (null for an empty file), or undefined when the file does not exist
 * @throws ConfigParseError if the file cannot be read or is malformed
 */
export function readYamlFile(filePath: string): unknown {
  const raw = readSource(filePath);
  if (raw === undefined) {
    return undefined;
  }

  try {
    // An empty document loads as undefined; keep "exists but empty" distinct
    return jsYaml.load(raw, { schema: jsYaml.CORE_SCHEMA, filename: filePath }) ?? null;
  } catch (error) {
    throw new ConfigParseError(filePath, errorMessage(error));
  }
}

/**
 * Read a YAML file whose top level must be a mapping
 *
 * An empty document is an empty mapping. Keys keep document order and
 * integers outside the safe range are read as bigint.
 *
 * @returns Parsed mapping, or undefined when the file does not exist
 * @throws ConfigParseError if the document is malformed or not a mapping
 */
export function readConfigMapping(filePath: string): ConfigMapping | undefined {
  const raw = readSource(filePath);
  if (raw === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw, {
      schema: "core",
      intAsBigInt: true,
      mapAsMap: true,
      logLevel: "error",
    });
  } catch (error) {
    throw new ConfigParseError(filePath, errorMessage(error));
  }
  if (parsed === null || parsed === undefined) {
    return EMPTY_MAPPING;
  }

  const converted = toConfigTree(parsed);
  if (!converted.ok) {
    throw new ConfigParseError(filePath, `${converted.reason} at ${converted.path}`);
  }
  if (!isConfigMapping(converted.tree)) {
    throw new ConfigParseError(filePath, "expected a YAML mapping at the top level");
  }
  return converted.tree;
}
