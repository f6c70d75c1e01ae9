#!/usr/bin/env node
/**
 * stackcfg entry point
 */

import { defaultCliDeps, runCli } from "./cli";
import { EXIT_INTERRUPTED } from "./constants";
import { errorMessage, exitCodeFor } from "./errors";
import { installSignalGuard } from "./signal-handlers";

async function main(argv: readonly string[]): Promise<void> {
  const guard = installSignalGuard({
    onSignal: (signal) => {
      console.error(`\nReceived ${signal}, stopping after the running command`);
    },
  });

  try {
    const exitCode = await runCli(argv, { ...defaultCliDeps(), receivedSignal: guard.received });
    process.exitCode = guard.received() === null ? exitCode : EXIT_INTERRUPTED;
  } finally {
    guard.cleanup();
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = exitCodeFor(error);
});
