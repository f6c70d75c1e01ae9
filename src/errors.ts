/**
 * Error taxonomy
 *
 * Every failure the engine can report is one of these classes. Each names the
 * offending file, service or key and maps to a process exit code.
 */

import { EXIT_CONFIG_ERROR, EXIT_FAILURE, EXIT_INTERRUPTED } from "./constants";

/**
 * Base class for all engine errors
 */
export abstract class StackConfigError extends Error {
  /** Process exit code when this error ends a run */
  abstract readonly exitCode: number;
}

/**
 * A single catalog problem (file-level or entry-level)
 */
export interface CatalogProblem {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Human-readable error message */
  readonly message: string;
  /** Path to the invalid field (e.g., "services[1].name") */
  readonly path?: string;
}

/**
 * Error thrown when the catalog cannot be read or is invalid
 */
export class CatalogError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly catalogPath: string,
    public readonly problems: readonly CatalogProblem[]
  ) {
    const details = problems
      .map((p) => `  - ${p.message}${p.path ? ` (at ${p.path})` : ""}`)
      .join("\n");
    super(`Invalid catalog ${catalogPath}:\n${details}`);
    this.name = "CatalogError";
  }
}

/**
 * Error thrown when a service name has no catalog entry
 */
export class ServiceNotFoundError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly serviceName: string,
    public readonly available: readonly string[]
  ) {
    const list = available.length > 0 ? available.join(", ") : "(none)";
    super(`Service "${serviceName}" not found in catalog. Available services: ${list}`);
    this.name = "ServiceNotFoundError";
  }
}

/**
 * Error thrown when a provider/stack combination has no global config
 */
export class MissingGlobalConfigError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly provider: string,
    public readonly stack: string,
    public readonly filePath: string
  ) {
    super(
      `Global config not found for provider "${provider}" and stack "${stack}": ${filePath}\n` +
        `Create it as: services/config/${provider}/Pulumi.${stack}.yaml`
    );
    this.name = "MissingGlobalConfigError";
  }
}

/**
 * Error thrown when a config layer is not valid YAML or not a config tree
 */
export class ConfigParseError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly filePath: string,
    public readonly parseError: string
  ) {
    super(`Failed to parse ${filePath}: ${parseError}`);
    this.name = "ConfigParseError";
  }
}

/**
 * Error thrown when a service's Pulumi.yaml is missing or has no usable name
 */
export class ProjectFileError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`${reason}: ${filePath}`);
    this.name = "ProjectFileError";
  }
}

/**
 * Error thrown when the generated stack file cannot be written
 */
export class StackFileWriteError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(
    public readonly filePath: string,
    cause: string
  ) {
    super(`Failed to write generated stack file ${filePath}: ${cause}`);
    this.name = "StackFileWriteError";
  }
}

/**
 * Error thrown when a stack can be neither selected nor created
 */
export class StackInitError extends StackConfigError {
  readonly exitCode = EXIT_FAILURE;

  constructor(
    public readonly stack: string,
    public readonly serviceDir: string,
    output: string
  ) {
    super(
      `Failed to select or init stack "${stack}" in ${serviceDir}${output ? `\n${output}` : ""}`
    );
    this.name = "StackInitError";
  }
}

/**
 * Error thrown when the external tool cannot be started at all
 */
export class ExternalToolError extends StackConfigError {
  readonly exitCode = EXIT_FAILURE;

  constructor(
    public readonly tool: string,
    cause: string
  ) {
    super(`Could not run "${tool}": ${cause}`);
    this.name = "ExternalToolError";
  }
}

/**
 * Error thrown when the external tool was stopped by SIGINT/SIGTERM
 */
export class InterruptedError extends StackConfigError {
  readonly exitCode = EXIT_INTERRUPTED;

  constructor(public readonly signal: NodeJS.Signals) {
    super(`Interrupted by ${signal}`);
    this.name = "InterruptedError";
  }
}

/**
 * Error thrown for an invalid command line
 */
export class UsageError extends StackConfigError {
  readonly exitCode = EXIT_CONFIG_ERROR;

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Exit code for a thrown value (unknown errors count as failures)
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof StackConfigError ? error.exitCode : EXIT_FAILURE;
}
