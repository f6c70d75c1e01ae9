/**
 * stackcfg
 *
 * Layered Pulumi stack config generation for multi-service infrastructure
 * repositories: catalog loading, config layer merging, stack file
 * generation and per-service Pulumi orchestration.
 */

export * from "./constants";
export * from "./errors";
export type {
  ConfigScalar,
  ConfigSequence,
  ConfigMapping,
  ConfigTree,
  ConfigTreeConversion,
} from "./types";
export { EMPTY_MAPPING, isConfigMapping, isConfigSequence, toConfigTree } from "./types";
export type { Logger, LogLevel } from "./logger";
export { createConsoleLogger, logLevelFor } from "./logger";

export * from "./catalog";
export * from "./config-layers";
export * from "./merge";
export * from "./mapping";
export * from "./stack-file";
export * from "./runner";
export * from "./orchestrator";

export type { CliOptions, ParsedCommand, Settings, Target } from "./settings";
export { resolveRootDir, resolveSettings, resolveTool, splitAction } from "./settings";
export type { CliDeps } from "./cli";
export { buildCli, parseCliArgs, runCli } from "./cli";
