/**
 * Command orchestrator module
 */

export type {
  FailureStage,
  FleetReport,
  OrchestratorDeps,
  RunRequest,
  ServiceOutcome,
  ServiceResult,
  ServiceState,
} from "./types";
export type { ResolvedService } from "./service";
export { resolveService, generateStackFile, processService } from "./service";
export { runFleet } from "./fleet";
export { formatResult, formatReport, serviceExitCode, fleetExitCode } from "./report";
