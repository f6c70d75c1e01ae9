/**
 * Single-service pipeline
 *
 * resolve -> generate -> ensure-stack -> execute -> done, with "failed"
 * reachable from every state. Errors become outcomes; nothing is thrown
 * for a service failure.
 */

import { PROJECT_CONFIG_KEY } from "../constants";
import { CatalogEntry } from "../catalog";
import {
  globalConfigPath,
  overridePath,
  readGlobal,
  readOverride,
  readProjectName,
  serviceDirectory,
  stackFilePath,
} from "../config-layers";
import { ConfigParseError, InterruptedError, errorMessage, exitCodeFor } from "../errors";
import { Logger } from "../logger";
import { MappedConfig, flattenConfig } from "../mapping";
import { findBroadcastCollisions, resolveConfig } from "../merge";
import { formatCommand } from "../runner";
import {
  NO_PRESERVED_SETTINGS,
  PreservedSettings,
  buildStackFileHeader,
  readPreservedSettings,
  renderStackFile,
  writeStackFile,
} from "../stack-file";
import {
  FailureStage,
  OrchestratorDeps,
  RunRequest,
  ServiceResult,
  ServiceState,
} from "./types";

/**
 * A service's config, resolved and namespaced
 */
export interface ResolvedService {
  readonly entry: CatalogEntry;
  readonly serviceDir: string;
  readonly projectName: string;
  readonly mapped: MappedConfig;
}

/**
 * Read the layers of a service and resolve its namespaced config
 *
 * Warns about projectConfig keys shadowing global keys and about
 * projectConfig declared in an override (where it is ignored).
 *
 * @throws MissingGlobalConfigError, ConfigParseError or ProjectFileError
 */
export function resolveService(
  entry: CatalogEntry,
  rootDir: string,
  stack: string,
  logger: Logger
): ResolvedService {
  const serviceDir = serviceDirectory(rootDir, entry);
  const global = readGlobal(rootDir, entry.provider, stack);
  const override = readOverride(serviceDir, stack);

  const collisions = findBroadcastCollisions(global);
  if (collisions.length > 0) {
    logger.warn(
      `${globalConfigPath(rootDir, entry.provider, stack)}: '${PROJECT_CONFIG_KEY}' overrides global keys: ${collisions.join(", ")}`
    );
  }
  if (override.has(PROJECT_CONFIG_KEY)) {
    logger.warn(
      `${overridePath(serviceDir, stack)}: '${PROJECT_CONFIG_KEY}' is only read from global config, ignoring it`
    );
  }

  const projectName = readProjectName(serviceDir);
  const resolved = resolveConfig({ global, override });

  return { entry, serviceDir, projectName, mapped: flattenConfig(resolved, projectName) };
}

/**
 * Settings of the previous generation, or none when that file is unreadable
 */
function preservedSettingsFor(filePath: string, logger: Logger): PreservedSettings {
  try {
    return readPreservedSettings(filePath);
  } catch (error) {
    if (!(error instanceof ConfigParseError)) throw error;
    logger.warn(`${error.message}; regenerating without preserved settings`);
    return NO_PRESERVED_SETTINGS;
  }
}

/**
 * Write the generated stack file of a resolved service
 *
 * @returns Path of the written file
 * @throws StackFileWriteError if the file cannot be written
 */
export function generateStackFile(
  resolved: ResolvedService,
  stack: string,
  logger: Logger
): string {
  const filePath = stackFilePath(resolved.serviceDir, stack);
  const header = buildStackFileHeader({
    provider: resolved.entry.provider,
    stack,
    service: resolved.entry.name,
  });
  const content = renderStackFile(resolved.mapped, header, preservedSettingsFor(filePath, logger));
  writeStackFile(filePath, content);
  return filePath;
}

/**
 * @throws InterruptedError if the wrapper has received SIGINT or SIGTERM
 */
function throwIfSignalReceived(deps: OrchestratorDeps): void {
  const signal = deps.receivedSignal?.() ?? null;
  if (signal !== null) {
    throw new InterruptedError(signal);
  }
}

/**
 * Run one service through the whole pipeline
 *
 * A signal received by the wrapper ends the service as interrupted even
 * when the tool traps it and exits normally.
 */
export async function processService(
  entry: CatalogEntry,
  request: RunRequest,
  deps: OrchestratorDeps
): Promise<ServiceResult> {
  const { logger, pulumi } = deps;
  let stage: FailureStage = "resolve";
  const transition = (from: FailureStage, to: ServiceState): void => {
    logger.debug(`${entry.name}: ${from} -> ${to}`);
  };

  logger.debug(`${entry.name}: resolve`);

  try {
    const resolved = resolveService(entry, request.rootDir, request.stack, logger);

    transition(stage, "generate");
    stage = "generate";
    const stackFile = generateStackFile(resolved, request.stack, logger);
    logger.info(`Generated ${stackFile}`);

    if (request.generateOnly) {
      transition(stage, "done");
      return { service: entry.name, outcome: { kind: "generated", stackFile } };
    }

    transition(stage, "ensure-stack");
    stage = "ensure-stack";
    throwIfSignalReceived(deps);
    await pulumi.ensureStack(resolved.serviceDir, request.stack);
    throwIfSignalReceived(deps);

    transition(stage, "execute");
    stage = "execute";
    const exitCode = await pulumi.runAction(
      resolved.serviceDir,
      request.stack,
      request.action,
      request.extraArgs
    );
    throwIfSignalReceived(deps);

    if (exitCode !== 0) {
      transition(stage, "failed");
      const command = formatCommand(pulumi.tool, [request.action]);
      return {
        service: entry.name,
        outcome: {
          kind: "failed",
          stage,
          message: `${command} exited with code ${String(exitCode)}`,
          exitCode,
        },
      };
    }

    transition(stage, "done");
    return { service: entry.name, outcome: { kind: "succeeded", stackFile } };
  } catch (error) {
    transition(stage, "failed");
    if (error instanceof InterruptedError) {
      return { service: entry.name, outcome: { kind: "interrupted", signal: error.signal } };
    }
    return {
      service: entry.name,
      outcome: {
        kind: "failed",
        stage,
        message: errorMessage(error),
        exitCode: exitCodeFor(error),
      },
    };
  }
}
