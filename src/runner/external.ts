/**
 * External tool boundary
 *
 * The only place a child process is spawned. Callers await each call
 * before starting the next, so fleet runs never overlap; the event loop
 * keeps running meanwhile, so signals reach the wrapper's handlers.
 */

import { spawn } from "child_process";
import { ExternalToolError } from "../errors";

export interface ExternalRequest {
  /** Working directory of the tool (the service directory) */
  readonly cwd: string;
  /** Arguments after the tool binary */
  readonly args: readonly string[];
  /**
   * Capture output instead of streaming it to the terminal
   * (used for checks such as `stack select`)
   */
  readonly capture?: boolean;
}

export interface ExternalResult {
  /** Exit status (1 when the tool was killed by a signal) */
  readonly exitCode: number;
  /** Combined stdout and stderr; empty when streamed */
  readonly output: string;
  /** Signal that terminated the tool, if any */
  readonly signal: NodeJS.Signals | null;
}

export interface ExternalRunner {
  /** Tool binary, for log messages */
  readonly tool: string;
  run(request: ExternalRequest): Promise<ExternalResult>;
}

/**
 * Runs the tool as a child process
 */
export class ProcessRunner implements ExternalRunner {
  constructor(
    public readonly tool: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  run(request: ExternalRequest): Promise<ExternalResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.tool, [...request.args], {
        cwd: request.cwd,
        env: this.env,
        stdio: request.capture ? ["ignore", "pipe", "pipe"] : "inherit",
      });

      const chunks: string[] = [];
      const collect = (chunk: Buffer): void => {
        chunks.push(chunk.toString("utf-8"));
      };
      child.stdout?.on("data", collect);
      child.stderr?.on("data", collect);

      child.on("error", (error) => {
        reject(new ExternalToolError(this.tool, error.message));
      });
      child.on("close", (code, signal) => {
        resolve({
          exitCode: code ?? 1,
          output: chunks.join("").trim(),
          signal,
        });
      });
    });
  }
}

/**
 * Render a command line for log messages
 */
export function formatCommand(tool: string, args: readonly string[]): string {
  return [tool, ...args].join(" ");
}
