/**
 * Fleet runs
 *
 * Processes catalog services one after another. A failed service is recorded
 * and the run moves on; an interrupt stops it and the remaining services are
 * reported as skipped.
 */

import { setImmediate as nextTurn } from "timers/promises";
import { CatalogEntry } from "../catalog";
import { processService } from "./service";
import { FleetReport, OrchestratorDeps, RunRequest, ServiceResult } from "./types";

export async function runFleet(
  entries: readonly CatalogEntry[],
  request: RunRequest,
  deps: OrchestratorDeps
): Promise<FleetReport> {
  const results: ServiceResult[] = [];
  let interrupted = false;

  for (const [index, entry] of entries.entries()) {
    // Let pending signal handlers run before deciding to start the next service
    await nextTurn();
    if (!interrupted && (deps.receivedSignal?.() ?? null) !== null) {
      interrupted = true;
    }
    if (interrupted) {
      results.push({ service: entry.name, outcome: { kind: "skipped" } });
      continue;
    }

    deps.logger.info(
      `\n[${String(index + 1)}/${String(entries.length)}] ${entry.name} (${entry.provider})`
    );
    const result = await processService(entry, request, deps);
    results.push(result);

    if (result.outcome.kind === "failed") {
      deps.logger.error(`${entry.name}: ${result.outcome.message}`);
    } else if (result.outcome.kind === "interrupted") {
      interrupted = true;
    }
  }

  return { results, interrupted };
}
