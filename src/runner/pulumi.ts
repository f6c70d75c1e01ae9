/**
 * Pulumi CLI commands
 *
 * Builds the stack select/init calls and the requested action on top of an
 * ExternalRunner. Orchestration decisions stay in the orchestrator.
 */

import { InterruptedError, StackInitError } from "../errors";
import { Logger } from "../logger";
import { ExternalResult, ExternalRunner, formatCommand } from "./external";

/**
 * Arguments selecting a stack
 */
export function stackSelectArgs(stack: string): string[] {
  return ["stack", "select", "-s", stack];
}

/**
 * Arguments creating a stack
 */
export function stackInitArgs(stack: string): string[] {
  return ["stack", "init", stack];
}

/**
 * Arguments running an action (preview, up, destroy, ...) against a stack
 */
export function actionArgs(action: string, stack: string, extraArgs: readonly string[]): string[] {
  return [action, "-s", stack, ...extraArgs];
}

function throwIfInterrupted(result: ExternalResult): void {
  if (result.signal === "SIGINT" || result.signal === "SIGTERM") {
    throw new InterruptedError(result.signal);
  }
}

export class PulumiCli {
  constructor(
    private readonly runner: ExternalRunner,
    private readonly logger: Logger
  ) {}

  /** Tool binary, for messages */
  get tool(): string {
    return this.runner.tool;
  }

  /**
   * Ensure the stack exists (select, or init when select fails)
   *
   * Safe to repeat: an existing stack is only selected.
   *
   * @throws StackInitError if the stack can be neither selected nor created
   * @throws InterruptedError if either call was interrupted
   */
  async ensureStack(serviceDir: string, stack: string): Promise<void> {
    const selectArgs = stackSelectArgs(stack);
    this.logger.debug(`Running: ${formatCommand(this.runner.tool, selectArgs)}`);
    const selected = await this.runner.run({ cwd: serviceDir, args: selectArgs, capture: true });
    throwIfInterrupted(selected);
    if (selected.exitCode === 0) {
      return;
    }
    if (selected.output) {
      this.logger.debug(selected.output);
    }

    const initArgs = stackInitArgs(stack);
    this.logger.info(`Stack "${stack}" not found, creating it`);
    this.logger.debug(`Running: ${formatCommand(this.runner.tool, initArgs)}`);
    const created = await this.runner.run({ cwd: serviceDir, args: initArgs, capture: true });
    throwIfInterrupted(created);
    if (created.exitCode !== 0) {
      throw new StackInitError(stack, serviceDir, created.output);
    }
  }

  /**
   * Run an action in the service directory, streaming its output
   *
   * @returns The tool's exit status
   * @throws InterruptedError if the tool was interrupted
   */
  async runAction(
    serviceDir: string,
    stack: string,
    action: string,
    extraArgs: readonly string[]
  ): Promise<number> {
    const args = actionArgs(action, stack, extraArgs);
    this.logger.info(`Executing: ${formatCommand(this.runner.tool, args)}`);
    const result = await this.runner.run({ cwd: serviceDir, args });
    throwIfInterrupted(result);
    return result.exitCode;
  }
}
