/**
 * Command line
 *
 *   stackcfg <stack> <service|all> [action] [args...] [options]
 *
 * Examples:
 *   stackcfg dev az-app1                 # preview one service
 *   stackcfg prod all up --yes           # up every service in catalog order
 *   stackcfg dev all -g --provider aws   # only write stack files for aws services
 *
 * Options the wrapper does not know, and everything after `--`, are passed
 * through to the provisioning tool.
 */

import { Command, CommanderError } from "commander";
import {
  CatalogEntry,
  filterByProvider,
  findService,
  getCatalogPath,
  loadCatalog,
  validateCatalog,
} from "./catalog";
import { DEFAULT_ACTION, EXIT_CONFIG_ERROR, EXIT_SUCCESS, FLEET_TARGET } from "./constants";
import { CatalogError, UsageError, errorMessage, exitCodeFor } from "./errors";
import { LogLevel, Logger, createConsoleLogger, logLevelFor } from "./logger";
import {
  OrchestratorDeps,
  RunRequest,
  fleetExitCode,
  formatReport,
  processService,
  runFleet,
  serviceExitCode,
} from "./orchestrator";
import { ExternalRunner, ProcessRunner, PulumiCli } from "./runner";
import { CliOptions, ParsedCommand, Settings, resolveRootDir, resolveSettings } from "./settings";

export function buildCli(): Command {
  return new Command()
    .name("stackcfg")
    .description("Generate Pulumi stack config from layered YAML and run Pulumi per service")
    .argument("[stack]", "Stack name (dev, staging, prod, ...)")
    .argument("[service]", `Catalog service name, or "${FLEET_TARGET}" for every service`)
    .argument("[action]", `Pulumi command (default: ${DEFAULT_ACTION})`)
    .argument("[args...]", "Arguments passed through to Pulumi")
    .option("-g, --generate-only", "Write stack files without running Pulumi")
    .option("--provider <name>", "Only services of this provider")
    .option("--validate", "Validate the catalog and list its services")
    .option("--root <dir>", "Repository root (default: $STACKCFG_ROOT or the current directory)")
    .option("-v, --verbose", "Debug output")
    .option("-q, --quiet", "Errors only")
    .allowUnknownOption()
    .exitOverride();
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws CommanderError for --help, --version and malformed options
 */
export function parseCliArgs(argv: readonly string[]): ParsedCommand {
  const program = buildCli();
  program.parse([...argv], { from: "user" });
  return { args: [...program.args], options: program.opts<CliOptions>() };
}

export interface CliDeps {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  createLogger(level: LogLevel): Logger;
  createRunner(tool: string, env: NodeJS.ProcessEnv): ExternalRunner;
  /** SIGINT/SIGTERM received by the process, if any */
  receivedSignal(): NodeJS.Signals | null;
}

export function defaultCliDeps(): CliDeps {
  return {
    env: process.env,
    cwd: process.cwd(),
    createLogger: createConsoleLogger,
    createRunner: (tool, env) => new ProcessRunner(tool, env),
    receivedSignal: () => null,
  };
}

function describeEntry(entry: CatalogEntry): string {
  const description = entry.description ? ` - ${entry.description}` : "";
  return `  ${entry.name} (${entry.provider}, ${entry.type}) ${entry.path}${description}`;
}

/**
 * --validate: check the catalog and list its services
 *
 * @throws CatalogError listing every problem
 */
function validateCommand(rootDir: string, logger: Logger): number {
  const result = validateCatalog(rootDir);
  if (!result.valid) {
    throw new CatalogError(getCatalogPath(rootDir), result.errors);
  }

  logger.info(`Catalog OK: ${String(result.entries.length)} services`);
  for (const entry of result.entries) {
    logger.info(describeEntry(entry));
  }
  return EXIT_SUCCESS;
}

async function runSingle(
  entry: CatalogEntry,
  request: RunRequest,
  deps: OrchestratorDeps
): Promise<number> {
  const result = await processService(entry, request, deps);
  if (result.outcome.kind === "failed") {
    deps.logger.error(result.outcome.message);
  } else if (result.outcome.kind === "interrupted") {
    deps.logger.error(`Interrupted by ${result.outcome.signal}`);
  }
  return serviceExitCode(result);
}

async function runCommand(settings: Settings, deps: CliDeps, logger: Logger): Promise<number> {
  // Catalog problems and unknown services end the run before any config is read
  const catalog = loadCatalog(settings.rootDir);
  const request: RunRequest = {
    rootDir: settings.rootDir,
    stack: settings.stack,
    action: settings.action,
    extraArgs: settings.extraArgs,
    generateOnly: settings.generateOnly,
  };

  if (settings.target.kind === "service") {
    const entry = findService(catalog, settings.target.name);
    if (settings.provider !== undefined && entry.provider !== settings.provider) {
      throw new UsageError(
        `Service "${entry.name}" belongs to provider "${entry.provider}", not "${settings.provider}"`
      );
    }
    const pulumi = new PulumiCli(deps.createRunner(settings.tool, deps.env), logger);
    return runSingle(entry, request, { pulumi, logger, receivedSignal: deps.receivedSignal });
  }

  const entries = filterByProvider(catalog, settings.provider);
  if (entries.length === 0) {
    throw new UsageError(`No catalog services for provider "${settings.provider ?? ""}"`);
  }

  const pulumi = new PulumiCli(deps.createRunner(settings.tool, deps.env), logger);
  const report = await runFleet(entries, request, {
    pulumi,
    logger,
    receivedSignal: deps.receivedSignal,
  });

  logger.info("");
  for (const line of formatReport(report)) {
    logger.info(line);
  }
  return fleetExitCode(report);
}

/**
 * Run the command line
 *
 * @returns Process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = defaultCliDeps()
): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    // Commander has already printed help or the parse error
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const logger = deps.createLogger(logLevelFor(command.options));

  try {
    if (command.options.validate) {
      return validateCommand(resolveRootDir(command.options, deps.env, deps.cwd), logger);
    }
    const settings = resolveSettings(command, deps.env, deps.cwd);
    logger.debug(`Repository root: ${settings.rootDir}`);
    return await runCommand(settings, deps, logger);
  } catch (error) {
    logger.error(errorMessage(error));
    return exitCodeFor(error);
  }
}
