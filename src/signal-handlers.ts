/**
 * SIGINT/SIGTERM handling
 *
 * The terminal sends the interrupt to the whole process group, so the
 * running tool gets it too and stops on its own. The guard keeps the
 * wrapper alive and records the signal; the orchestrator reads it after
 * every tool call and starts no further service once it is set.
 */

export type SignalGuard = {
  /** First signal received, if any */
  received: () => NodeJS.Signals | null;
  cleanup: () => void;
};

export function installSignalGuard(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {}
): SignalGuard {
  let received: NodeJS.Signals | null = null;
  let cleaned = false;

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (received !== null) return;
    received = signal;
    opts.onSignal?.(signal);
  };

  const onSigint = (): void => handleSignal("SIGINT");
  const onSigterm = (): void => handleSignal("SIGTERM");

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return {
    received: () => received,
    cleanup,
  };
}
