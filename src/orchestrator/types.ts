/**
 * Orchestrator types
 */

import type { Logger } from "../logger";
import type { PulumiCli } from "../runner";

/**
 * Per-service states, in order; "failed" is reachable from any of them
 */
export type ServiceState = "resolve" | "generate" | "ensure-stack" | "execute" | "done" | "failed";

/** States a service can fail in */
export type FailureStage = Exclude<ServiceState, "done" | "failed">;

export type ServiceOutcome =
  /** The tool exited 0 */
  | { readonly kind: "succeeded"; readonly stackFile: string }
  /** Stack file written, tool not run (--generate-only) */
  | { readonly kind: "generated"; readonly stackFile: string }
  | {
      readonly kind: "failed";
      readonly stage: FailureStage;
      readonly message: string;
      /** Tool exit status when the tool ran, else the error's exit code */
      readonly exitCode: number;
    }
  /** SIGINT/SIGTERM arrived while the service was running */
  | { readonly kind: "interrupted"; readonly signal: NodeJS.Signals }
  /** Not started because the fleet run was interrupted */
  | { readonly kind: "skipped" };

export interface ServiceResult {
  readonly service: string;
  readonly outcome: ServiceOutcome;
}

/**
 * What to do for each service
 */
export interface RunRequest {
  readonly rootDir: string;
  readonly stack: string;
  /** Tool action (preview, up, destroy, refresh, ...) */
  readonly action: string;
  /** Arguments appended to the action */
  readonly extraArgs: readonly string[];
  /** Write stack files only */
  readonly generateOnly: boolean;
}

export interface OrchestratorDeps {
  readonly pulumi: PulumiCli;
  readonly logger: Logger;
  /**
   * Signal the wrapper has received, if any; consulted between steps and
   * after every tool call. Without it only a tool's own signal exit counts.
   */
  readonly receivedSignal?: () => NodeJS.Signals | null;
}

/**
 * Result of a fleet run, one entry per catalog service in catalog order
 */
export interface FleetReport {
  readonly results: readonly ServiceResult[];
  readonly interrupted: boolean;
}
