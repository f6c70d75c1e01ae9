/**
 * Run summary and exit codes
 */

import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_SUCCESS } from "../constants";
import { FleetReport, ServiceOutcome, ServiceResult } from "./types";

type OutcomeKind = ServiceOutcome["kind"];

const SUMMARY_ORDER: readonly OutcomeKind[] = [
  "succeeded",
  "generated",
  "failed",
  "interrupted",
  "skipped",
];

/** Always shown in the summary, even at zero */
const ALWAYS_COUNTED: ReadonlySet<OutcomeKind> = new Set<OutcomeKind>(["succeeded", "failed"]);

function firstLine(message: string): string {
  return message.split("\n", 1)[0];
}

/**
 * One report line for a service
 */
export function formatResult(result: ServiceResult): string {
  const { service, outcome } = result;
  switch (outcome.kind) {
    case "succeeded":
      return `  ✓ ${service}`;
    case "generated":
      return `  ✓ ${service} (generated)`;
    case "failed":
      return `  ✗ ${service} [${outcome.stage}]: ${firstLine(outcome.message)}`;
    case "interrupted":
      return `  ✗ ${service}: interrupted by ${outcome.signal}`;
    case "skipped":
      return `  - ${service}: skipped`;
  }
}

/**
 * Summary line followed by one line per service
 */
export function formatReport(report: FleetReport): string[] {
  const counts = new Map<OutcomeKind, number>();
  for (const { outcome } of report.results) {
    counts.set(outcome.kind, (counts.get(outcome.kind) ?? 0) + 1);
  }

  const parts = SUMMARY_ORDER.filter(
    (kind) => ALWAYS_COUNTED.has(kind) || (counts.get(kind) ?? 0) > 0
  ).map((kind) => `${String(counts.get(kind) ?? 0)} ${kind}`);

  return [`Summary: ${parts.join(", ")}`, ...report.results.map(formatResult)];
}

/**
 * Exit code of a single-service run (mirrors the tool's exit status)
 */
export function serviceExitCode(result: ServiceResult): number {
  switch (result.outcome.kind) {
    case "succeeded":
    case "generated":
      return EXIT_SUCCESS;
    case "failed":
      return result.outcome.exitCode;
    case "interrupted":
    case "skipped":
      return EXIT_INTERRUPTED;
  }
}

/**
 * Exit code of a fleet run: 0 only when no service failed
 */
export function fleetExitCode(report: FleetReport): number {
  if (report.interrupted) {
    return EXIT_INTERRUPTED;
  }
  const failed = report.results.some((r) => r.outcome.kind === "failed");
  return failed ? EXIT_FAILURE : EXIT_SUCCESS;
}
