import { describe, it, expect } from "vitest";
import { fleetExitCode, formatReport, formatResult, serviceExitCode } from "./report";
import { FleetReport, ServiceResult } from "./types";

const failed: ServiceResult = {
  service: "az-app2",
  outcome: {
    kind: "failed",
    stage: "ensure-stack",
    message: 'Failed to select or init stack "dev" in /repo/app2\nerror: access denied',
    exitCode: 1,
  },
};

describe("formatResult", () => {
  it("shows only the first line of a failure message", () => {
    expect(formatResult(failed)).toBe(
      '  ✗ az-app2 [ensure-stack]: Failed to select or init stack "dev" in /repo/app2'
    );
  });

  it("marks interrupted and skipped services", () => {
    const interrupted: ServiceResult = {
      service: "a",
      outcome: { kind: "interrupted", signal: "SIGTERM" },
    };
    expect(formatResult(interrupted)).toBe("  ✗ a: interrupted by SIGTERM");
    expect(formatResult({ service: "b", outcome: { kind: "skipped" } })).toBe("  - b: skipped");
  });
});

describe("formatReport", () => {
  it("counts outcomes and lists services in run order", () => {
    const report: FleetReport = {
      interrupted: true,
      results: [
        {
          service: "az-app1",
          outcome: { kind: "succeeded", stackFile: "/repo/app1/Pulumi.dev.yaml" },
        },
        failed,
        { service: "aws-api", outcome: { kind: "interrupted", signal: "SIGINT" } },
        { service: "aws-db", outcome: { kind: "skipped" } },
      ],
    };

    expect(formatReport(report)).toEqual([
      "Summary: 1 succeeded, 1 failed, 1 interrupted, 1 skipped",
      "  ✓ az-app1",
      '  ✗ az-app2 [ensure-stack]: Failed to select or init stack "dev" in /repo/app2',
      "  ✗ aws-api: interrupted by SIGINT",
      "  - aws-db: skipped",
    ]);
  });

  it("reports an empty run", () => {
    expect(formatReport({ interrupted: false, results: [] })).toEqual([
      "Summary: 0 succeeded, 0 failed",
    ]);
  });
});

describe("exit codes", () => {
  it("mirrors the failure's exit code for a single service", () => {
    expect(serviceExitCode(failed)).toBe(1);
    expect(
      serviceExitCode({
        service: "x",
        outcome: { kind: "failed", stage: "resolve", message: "m", exitCode: 2 },
      })
    ).toBe(2);
    expect(serviceExitCode({ service: "x", outcome: { kind: "generated", stackFile: "f" } })).toBe(
      0
    );
    expect(
      serviceExitCode({ service: "x", outcome: { kind: "interrupted", signal: "SIGINT" } })
    ).toBe(130);
  });

  it("exits 0 for a fleet only when nothing failed", () => {
    const ok: ServiceResult = { service: "a", outcome: { kind: "succeeded", stackFile: "f" } };
    expect(fleetExitCode({ interrupted: false, results: [ok, ok] })).toBe(0);
    expect(fleetExitCode({ interrupted: false, results: [ok, failed, ok] })).toBe(1);
    expect(fleetExitCode({ interrupted: true, results: [failed] })).toBe(130);
  });
});
