/**
 * Run settings
 *
 * Turns the parsed command line and the environment into validated settings.
 *
 * Environment:
 * - STACKCFG_ROOT: repository root when --root is not given (default: cwd)
 * - STACKCFG_TOOL: provisioning tool binary (default: pulumi)
 */

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_ACTION, DEFAULT_TOOL, FLEET_TARGET, isValidSlug } from "./constants";
import { UsageError } from "./errors";

export const USAGE = `stackcfg <stack> <service|${FLEET_TARGET}> [action] [args...]`;

/**
 * Options as parsed from the command line
 */
export interface CliOptions {
  generateOnly?: boolean;
  provider?: string;
  validate?: boolean;
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface ParsedCommand {
  /** Positional arguments and unknown options, in command-line order */
  readonly args: readonly string[];
  readonly options: CliOptions;
}

export type Target =
  | { readonly kind: "fleet" }
  | { readonly kind: "service"; readonly name: string };

export interface Settings {
  readonly rootDir: string;
  readonly stack: string;
  readonly target: Target;
  readonly action: string;
  readonly extraArgs: readonly string[];
  readonly generateOnly: boolean;
  /** Restrict to services of this provider */
  readonly provider?: string;
  readonly tool: string;
}

/**
 * Resolve the repository root (--root, then STACKCFG_ROOT, then cwd)
 *
 * @throws UsageError if it is not an existing directory
 */
export function resolveRootDir(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
  cwd: string
): string {
  const rootDir = path.resolve(cwd, options.root ?? env.STACKCFG_ROOT ?? ".");
  if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
    throw new UsageError(`Repository root not found: ${rootDir}`);
  }
  return rootDir;
}

/**
 * Provisioning tool binary
 */
export function resolveTool(env: NodeJS.ProcessEnv): string {
  return env.STACKCFG_TOOL || DEFAULT_TOOL;
}

/**
 * Split what follows <stack> <service> into the action and its arguments
 *
 * When the first of them is an option, the action is the default one.
 */
export function splitAction(rest: readonly string[]): { action: string; extraArgs: string[] } {
  const [first, ...others] = rest;
  if (first === undefined || first.startsWith("-")) {
    return { action: DEFAULT_ACTION, extraArgs: [...rest] };
  }
  if (!isValidSlug(first)) {
    throw new UsageError(`Invalid action: "${first}"`);
  }
  return { action: first, extraArgs: others };
}

/**
 * Validate the command line and build run settings
 *
 * @throws UsageError for missing or invalid arguments
 */
export function resolveSettings(
  command: ParsedCommand,
  env: NodeJS.ProcessEnv,
  cwd: string
): Settings {
  const [stack, service, ...rest] = command.args;
  const { options } = command;

  if (stack === undefined || service === undefined) {
    throw new UsageError(`Usage: ${USAGE}`);
  }

  // Validate stack name (lowercase alphanumeric with hyphens)
  if (!isValidSlug(stack)) {
    throw new UsageError(
      `Invalid stack name: "${stack}". Use lowercase letters, numbers, and hyphens.`
    );
  }
  if (service !== FLEET_TARGET && !isValidSlug(service)) {
    throw new UsageError(
      `Invalid service name: "${service}". Use a catalog service name or "${FLEET_TARGET}".`
    );
  }
  if (options.provider !== undefined && !isValidSlug(options.provider)) {
    throw new UsageError(`Invalid provider: "${options.provider}"`);
  }

  const { action, extraArgs } = splitAction(rest);

  return {
    rootDir: resolveRootDir(options, env, cwd),
    stack,
    target: service === FLEET_TARGET ? { kind: "fleet" } : { kind: "service", name: service },
    action,
    extraArgs,
    generateOnly: options.generateOnly ?? false,
    provider: options.provider,
    tool: resolveTool(env),
  };
}
