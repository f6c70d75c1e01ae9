/**
 * Generated stack file writer
 *
 * Renders Pulumi.<stack>.yaml: a warning header followed by the `config:`
 * block. Rendering is deterministic, so unchanged inputs produce
 * byte-identical files.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "yaml";
import { overrideFileName, stackFileName } from "../constants";
import { StackFileWriteError, errorMessage } from "../errors";
import { MappedConfig } from "../mapping";
import { ConfigMapping, ConfigTree, EMPTY_MAPPING, isConfigMapping } from "../types";
import { readConfigMapping } from "../yaml-file";

/**
 * Settings carried over from a previously generated file
 *
 * Only what Pulumi itself writes there: stack-level settings such as
 * `encryptionsalt`, and `secure:` values set with `pulumi config set --secret`.
 */
export interface PreservedSettings {
  /** Top-level keys other than `config`, in file order */
  readonly settings: ConfigMapping;
  /** Secret config entries, in file order */
  readonly secureConfig: ConfigMapping;
}

export const NO_PRESERVED_SETTINGS: PreservedSettings = {
  settings: EMPTY_MAPPING,
  secureConfig: EMPTY_MAPPING,
};

/**
 * Header lines identifying the file as machine-generated
 */
export function buildStackFileHeader(inputs: {
  provider: string;
  stack: string;
  service: string;
}): string[] {
  return [
    "AUTO-GENERATED by stackcfg - DO NOT EDIT",
    `Config inherited from: services/config/${inputs.provider}/${stackFileName(inputs.stack)}`,
    `Service overrides: ${overrideFileName(inputs.stack)}`,
    `Regenerate with: stackcfg ${inputs.stack} ${inputs.service} --generate-only`,
  ];
}

/**
 * Check if a config value is a Pulumi secret ({ secure: <ciphertext> })
 */
export function isSecureValue(value: ConfigTree): boolean {
  return isConfigMapping(value) && value.size === 1 && typeof value.get("secure") === "string";
}

/**
 * Read the settings of an existing generated file
 *
 * Plain config values of an older generation are not kept: the generated
 * file is an output, never a config layer.
 *
 * @throws ConfigParseError if the existing file is malformed
 */
export function readPreservedSettings(filePath: string): PreservedSettings {
  const existing = readConfigMapping(filePath);
  if (existing === undefined) {
    return NO_PRESERVED_SETTINGS;
  }

  const settings = new Map<string, ConfigTree>();
  const secureConfig = new Map<string, ConfigTree>();

  for (const [key, value] of existing) {
    if (key !== "config") {
      settings.set(key, value);
      continue;
    }
    if (!isConfigMapping(value)) continue;
    for (const [configKey, configValue] of value) {
      if (isSecureValue(configValue)) {
        secureConfig.set(configKey, configValue);
      }
    }
  }

  return { settings, secureConfig };
}

/**
 * Render the generated file content
 *
 * Mappings are written in insertion order. Secret entries not defined by
 * the mapped config are appended after it.
 */
export function renderStackFile(
  mapped: MappedConfig,
  header: readonly string[],
  preserved: PreservedSettings = NO_PRESERVED_SETTINGS
): string {
  const config = new Map(mapped);
  for (const [key, value] of preserved.secureConfig) {
    if (!config.has(key)) {
      config.set(key, value);
    }
  }

  const document = new Map<string, ConfigTree>(preserved.settings);
  document.set("config", config);
  const headerText = header.map((line) => `# ${line}\n`).join("");
  return `${headerText}\n${yaml.stringify(document, { lineWidth: 0 })}`;
}

/**
 * Write the generated file atomically
 *
 * Content goes to a temporary sibling first and is renamed over the target,
 * so a failed write never leaves a partial file at `filePath`.
 *
 * @throws StackFileWriteError naming the target path
 */
export function writeStackFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${String(process.pid)}.tmp`);

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmpPath, content, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw new StackFileWriteError(filePath, errorMessage(error));
  }
}
