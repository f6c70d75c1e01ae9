/**
 * Tests for the command line
 *
 * Runs the whole command against fixture repositories with a fake Pulumi runner.
 */

import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CliDeps, parseCliArgs, runCli } from "./cli";
import { LogLevel } from "./logger";
import {
  FakeResponder,
  FakeRunner,
  RecordingLogger,
  createRecordingLogger,
} from "./__tests__/fakes";
import { RepoFixture, createRepoFixture, writeSampleRepo } from "./__tests__/repo-fixture";

let repo: RepoFixture;
let logger: RecordingLogger;
let runner: FakeRunner;
let levels: LogLevel[];
let tools: string[];

beforeEach(() => {
  repo = createRepoFixture();
  writeSampleRepo(repo);
  repo.write("services/config/azure/Pulumi.dev.yaml", "location: westeurope\n");
  repo.write("services/config/aws/Pulumi.dev.yaml", "region: eu-west-1\n");
  logger = createRecordingLogger();
  runner = new FakeRunner();
  levels = [];
  tools = [];
});

afterEach(() => {
  repo.cleanup();
});

function deps(overrides: Partial<CliDeps> = {}, respond?: FakeResponder): CliDeps {
  if (respond) runner = new FakeRunner(respond);
  return {
    env: {},
    cwd: repo.root,
    createLogger: (level) => {
      levels.push(level);
      return logger;
    },
    createRunner: (tool) => {
      tools.push(tool);
      return runner;
    },
    receivedSignal: () => null,
    ...overrides,
  };
}

function errors(): string[] {
  return logger.lines.filter((line) => line.startsWith("error:"));
}

describe("parseCliArgs", () => {
  it("keeps unknown options as passthrough arguments", () => {
    expect(parseCliArgs(["dev", "az-app1", "up", "--yes", "-g"])).toEqual({
      args: ["dev", "az-app1", "up", "--yes"],
      options: { generateOnly: true },
    });
  });

  it("passes everything after -- through", () => {
    expect(parseCliArgs(["dev", "all", "up", "--", "--provider", "x"]).args).toEqual([
      "dev",
      "all",
      "up",
      "--provider",
      "x",
    ]);
  });

  it("reads the wrapper's own options anywhere", () => {
    expect(
      parseCliArgs(["--root", "/repo", "dev", "all", "--provider", "aws", "-v"]).options
    ).toEqual({ root: "/repo", provider: "aws", verbose: true });
  });
});

describe("runCli", () => {
  it("fails on an unknown service before reading any config", async () => {
    repo.write("services/config/azure/Pulumi.dev.yaml", "location: [broken\n");
    const exitCode = await runCli(["dev", "nope", "up"], deps());

    expect(exitCode).toBe(2);
    expect(errors()).toEqual([
      'error: Service "nope" not found in catalog. Available services: az-app1, az-app2, aws-api',
    ]);
    expect(repo.exists("services/azure/app1/Pulumi.dev.yaml")).toBe(false);
    expect(runner.calls).toEqual([]);
  });

  it("runs one service and returns 0 on success", async () => {
    const exitCode = await runCli(["dev", "az-app1", "up", "--yes"], deps());

    expect(exitCode).toBe(0);
    expect(runner.commands()).toEqual(["stack select -s dev", "up -s dev --yes"]);
    expect(repo.read("services/azure/app1/Pulumi.dev.yaml")).toContain(
      "config:\n  az-app1:location: westeurope\n"
    );
  });

  it("previews when no action is given", async () => {
    await runCli(["dev", "az-app2", "--diff"], deps());
    expect(runner.commands()).toEqual(["stack select -s dev", "preview -s dev --diff"]);
  });

  it("mirrors the tool's exit status for a single service", async () => {
    const exitCode = await runCli(
      ["dev", "az-app1", "up"],
      deps({}, (req) => (req.args[0] === "up" ? { exitCode: 255 } : undefined))
    );

    expect(exitCode).toBe(255);
    expect(errors()).toEqual(["error: pulumi up exited with code 255"]);
  });

  it("exits 2 when the global config is missing", async () => {
    const exitCode = await runCli(["staging", "az-app1"], deps());

    expect(exitCode).toBe(2);
    expect(runner.calls).toEqual([]);
  });

  it("exits 130 when the tool is interrupted", async () => {
    const exitCode = await runCli(
      ["dev", "az-app1", "up"],
      deps({}, (req) => (req.args[0] === "up" ? { exitCode: 1, signal: "SIGINT" } : undefined))
    );

    expect(exitCode).toBe(130);
    expect(errors()).toEqual(["error: Interrupted by SIGINT"]);
  });

  it("generates every stack file with all --generate-only", async () => {
    const exitCode = await runCli(["dev", "all", "--generate-only"], deps());

    expect(exitCode).toBe(0);
    expect(repo.exists("services/azure/app1/Pulumi.dev.yaml")).toBe(true);
    expect(repo.exists("services/azure/app2/Pulumi.dev.yaml")).toBe(true);
    expect(repo.exists("services/aws/api/Pulumi.dev.yaml")).toBe(true);
    expect(runner.calls).toEqual([]);
    expect(logger.lines.slice(-4)).toEqual([
      "info: Summary: 0 succeeded, 3 generated, 0 failed",
      "info:   ✓ az-app1 (generated)",
      "info:   ✓ az-app2 (generated)",
      "info:   ✓ aws-api (generated)",
    ]);
  });

  it("restricts a fleet run to one provider", async () => {
    await runCli(["dev", "all", "-g", "--provider", "aws"], deps());

    expect(repo.exists("services/aws/api/Pulumi.dev.yaml")).toBe(true);
    expect(repo.exists("services/azure/app1/Pulumi.dev.yaml")).toBe(false);
  });

  it("rejects a provider without catalog services", async () => {
    expect(await runCli(["dev", "all", "--provider", "gcp"], deps())).toBe(2);
    expect(errors()).toEqual(['error: No catalog services for provider "gcp"']);
  });

  it("rejects a service of another provider", async () => {
    expect(await runCli(["dev", "az-app1", "--provider", "aws"], deps())).toBe(2);
    expect(errors()).toEqual([
      'error: Service "az-app1" belongs to provider "azure", not "aws"',
    ]);
  });

  it("reports M-of-N fleet failures and exits 1", async () => {
    const exitCode = await runCli(
      ["dev", "all", "up"],
      deps({}, (req) =>
        req.args[0] === "up" && req.cwd.endsWith("app2") ? { exitCode: 1 } : undefined
      )
    );

    expect(exitCode).toBe(1);
    expect(logger.lines.slice(-4)).toEqual([
      "info: Summary: 2 succeeded, 1 failed",
      "info:   ✓ az-app1",
      "info:   ✗ az-app2 [execute]: pulumi up exited with code 1",
      "info:   ✓ aws-api",
    ]);
  });

  it("stops a fleet run on a signal the tool traps and exits 130", async () => {
    let received: NodeJS.Signals | null = null;
    const exitCode = await runCli(
      ["dev", "all", "up"],
      deps({ receivedSignal: () => received }, (req) => {
        if (req.args[0] !== "up") return undefined;
        received = "SIGINT";
        return { exitCode: 255 };
      })
    );

    expect(exitCode).toBe(130);
    expect(runner.commands()).toEqual(["stack select -s dev", "up -s dev"]);
    expect(logger.lines.slice(-4)).toEqual([
      "info: Summary: 0 succeeded, 0 failed, 1 interrupted, 2 skipped",
      "info:   ✗ az-app1: interrupted by SIGINT",
      "info:   - az-app2: skipped",
      "info:   - aws-api: skipped",
    ]);
  });

  it("exits 2 on an invalid catalog", async () => {
    repo.write(
      "catalog.yaml",
      "services:\n  - name: Bad_Name\n    path: services/azure/app1\n    type: stateless\n"
    );
    const exitCode = await runCli(["dev", "all"], deps());

    expect(exitCode).toBe(2);
    expect(errors()).toHaveLength(1);
    expect(errors()[0].startsWith("error: Invalid catalog ")).toBe(true);
  });

  it("exits 2 on an invalid stack name", async () => {
    expect(await runCli(["Dev", "all"], deps())).toBe(2);
    expect(errors()).toEqual([
      'error: Invalid stack name: "Dev". Use lowercase letters, numbers, and hyphens.',
    ]);
  });

  it("finds the repository through --root and STACKCFG_ROOT", async () => {
    const elsewhere = { cwd: os.tmpdir() };
    expect(await runCli(["dev", "az-app1", "-g", "--root", repo.root], deps(elsewhere))).toBe(0);
    const fromEnv = deps({ ...elsewhere, env: { STACKCFG_ROOT: repo.root } });
    expect(await runCli(["dev", "az-app2", "-g"], fromEnv)).toBe(0);
    expect(repo.exists("services/azure/app2/Pulumi.dev.yaml")).toBe(true);
  });

  it("runs the tool named by STACKCFG_TOOL", async () => {
    await runCli(["dev", "az-app1"], deps({ env: { STACKCFG_TOOL: "/usr/local/bin/pulumi" } }));
    expect(tools).toEqual(["/usr/local/bin/pulumi"]);
  });

  it("picks the log level from --verbose and --quiet", async () => {
    await runCli(["dev", "all", "-g", "-v"], deps());
    await runCli(["dev", "all", "-g", "-q"], deps());
    await runCli(["dev", "all", "-g", "-v", "-q"], deps());
    expect(levels).toEqual(["debug", "error", "error"]);
  });
});

describe("runCli --validate", () => {
  it("accepts the example repository", async () => {
    const root = path.resolve(__dirname, "../example");
    expect(await runCli(["--validate", "--root", root], deps())).toBe(0);
    expect(logger.lines[0]).toBe("info: Catalog OK: 3 services");
  });

  it("lists the catalog services", async () => {
    expect(await runCli(["--validate"], deps())).toBe(0);
    expect(logger.lines).toEqual([
      "info: Catalog OK: 3 services",
      "info:   az-app1 (azure, stateless) services/azure/app1 - First Azure app",
      "info:   az-app2 (azure, stateful) services/azure/app2",
      "info:   aws-api (aws, stateless) services/aws/api - AWS API",
    ]);
  });

  it("exits 2 and lists every problem", async () => {
    repo.write(
      "catalog.yaml",
      [
        "services:",
        "  - name: az-app1",
        "    path: services/azure/app1",
        "    type: stateless",
        "  - name: az-app1",
        "    path: services/missing",
        "    type: stateless",
        "",
      ].join("\n")
    );

    expect(await runCli(["--validate"], deps())).toBe(2);
    const [error] = errors();
    expect(error.split("\n")[0]).toBe(`error: Invalid catalog ${repo.root}/catalog.yaml:`);
    expect(error.split("\n")).toHaveLength(3);
  });
});
