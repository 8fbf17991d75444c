import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import {
  type ArtifactSpec,
  type CacheSpec,
  type JobNode,
  type ResolvedEnvironment,
  RunnerInfrastructureFailure,
  buildJobGraph,
  createPipelineContext,
  loadDefinition,
} from "@conveyor/core";
import { LocalShellExecutor, renderScript } from "../src/shell-executor.js";

const decode = (b: Uint8Array | undefined) => (b === undefined ? undefined : new TextDecoder().decode(b));

function buildNode(): JobNode {
  const definition = loadDefinition("build:\n  script: echo build\n");
  const graph = buildJobGraph(definition, createPipelineContext({ source: "push", refName: "main" }));
  return graph.getJob("build");
}

function environment(overrides: Partial<ResolvedEnvironment> = {}): ResolvedEnvironment {
  return {
    jobId: 7,
    jobName: "build",
    stage: "test",
    attempt: 1,
    image: null,
    tags: [],
    script: [],
    beforeScript: [],
    afterScript: [],
    variables: {},
    artifacts: [],
    caches: [],
    artifactSpec: null,
    cacheSpecs: [],
    timeoutMs: null,
    signal: new AbortController().signal,
    ...overrides,
  };
}

function artifactSpec(overrides: Partial<ArtifactSpec> = {}): ArtifactSpec {
  return {
    name: "artifacts",
    paths: [],
    exclude: [],
    when: "on_success",
    expireInMs: null,
    reports: { dotenv: [] },
    ...overrides,
  };
}

describe("renderScript", () => {
  it("echoes each command before running it", () => {
    expect(renderScript(["make", "echo 'done'"])).toBe(
      "echo '$ make'\nmake\necho '$ echo '\\''done'\\'''\necho 'done'",
    );
  });
});

describe("LocalShellExecutor", () => {
  const workRoot = join(process.cwd(), ".test-tmp-shell");
  const job = buildNode();
  let executor: LocalShellExecutor;

  beforeEach(() => {
    rmSync(workRoot, { recursive: true, force: true });
    mkdirSync(workRoot, { recursive: true });
    executor = new LocalShellExecutor({ workRoot, killGraceMs: 200, env: { PATH: process.env.PATH } });
  });

  afterEach(() => {
    rmSync(workRoot, { recursive: true, force: true });
  });

  it("runs before_script and script in one shell", async () => {
    const outcome = await executor.dispatch(
      job,
      environment({ beforeScript: ["GREETING=hello"], script: ['echo "$GREETING"'] }),
    );
    expect(outcome.status).toBe("success");
    expect(outcome.exitCode).toBe(0);
    expect(outcome.log).toBe('$ GREETING=hello\n$ echo "$GREETING"\nhello\n');
  });

  it("exports job variables", async () => {
    const outcome = await executor.dispatch(
      job,
      environment({ script: ["echo $DEPLOY_TARGET"], variables: { DEPLOY_TARGET: "staging" } }),
    );
    expect(outcome.log).toBe("$ echo $DEPLOY_TARGET\nstaging\n");
  });

  it("reports a non-zero exit as script_failure", async () => {
    const outcome = await executor.dispatch(job, environment({ script: ["exit 3"] }));
    expect(outcome.status).toBe("failed");
    expect(outcome.failureReason).toBe("script_failure");
    expect(outcome.exitCode).toBe(3);
    expect(outcome.error).toBe("script exited with code 3");
  });

  it("stops at the first failing command", async () => {
    const outcome = await executor.dispatch(job, environment({ script: ["false", "echo unreachable"] }));
    expect(outcome.exitCode).toBe(1);
    expect(outcome.log).toBe("$ false\n");
  });

  it("runs after_script after a failure with the job status", async () => {
    const outcome = await executor.dispatch(
      job,
      environment({ script: ["exit 1"], afterScript: ['echo "status=$CI_JOB_STATUS"'] }),
    );
    expect(outcome.status).toBe("failed");
    expect(outcome.log).toBe('$ exit 1\n$ echo "status=$CI_JOB_STATUS"\nstatus=failed\n');
  });

  it("does not fail the job when after_script fails", async () => {
    const outcome = await executor.dispatch(job, environment({ script: ["true"], afterScript: ["exit 4"] }));
    expect(outcome.status).toBe("success");
    expect(outcome.log).toBe("$ true\n$ exit 4\nafter_script exited with code 4\n");
  });

  it("collects artifact paths and dotenv reports", async () => {
    const outcome = await executor.dispatch(
      job,
      environment({
        script: ["mkdir -p dist", "echo built > dist/app.txt", "echo VERSION=1.2.3 > build.env"],
        artifactSpec: artifactSpec({ paths: ["dist"], reports: { dotenv: ["build.env", "missing.env"] } }),
      }),
    );
    expect(outcome.status).toBe("success");
    expect(Object.keys(outcome.artifacts ?? {})).toEqual(["dist/app.txt"]);
    expect(decode(outcome.artifacts?.["dist/app.txt"])).toBe("built\n");
    expect(outcome.reports?.dotenv).toEqual({ VERSION: "1.2.3" });
  });

  it("collects push caches and skips pull-only ones", async () => {
    const push: CacheSpec = { key: "deps", paths: ["vendor"], policy: "pull-push", when: "on_success", fallbackKeys: [] };
    const pull: CacheSpec = { ...push, key: "tools", paths: ["tools"], policy: "pull" };
    const outcome = await executor.dispatch(
      job,
      environment({
        script: ["mkdir -p vendor tools", "echo lib > vendor/lib.txt", "echo t > tools/t.txt"],
        cacheSpecs: [push, pull],
      }),
    );
    expect(Object.keys(outcome.cache ?? {})).toEqual(["deps"]);
    expect(decode(outcome.cache?.deps?.["vendor/lib.txt"])).toBe("lib\n");
  });

  it("makes upstream artifacts available to the script", async () => {
    const files = new Map([["input.txt", new TextEncoder().encode("payload\n")]]);
    const outcome = await executor.dispatch(
      job,
      environment({
        script: ["cat input.txt"],
        artifacts: [
          {
            id: "1-compile-artifacts-v1",
            name: "artifacts",
            jobName: "compile",
            jobId: 1,
            version: 1,
            sizeBytes: 8,
            fileCount: 1,
            dotenv: {},
            createdAt: 0,
            expiresAt: null,
            isFileBacked: false,
            files,
          },
        ],
      }),
    );
    expect(outcome.log).toBe("$ cat input.txt\npayload\n");
  });

  it("returns canceled when the signal aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const started = Date.now();
    const outcome = await executor.dispatch(job, environment({ script: ["sleep 30"], signal: controller.signal }));
    expect(outcome.status).toBe("canceled");
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("cancel() stops the running script", async () => {
    const pending = executor.dispatch(job, environment({ script: ["sleep 30"] }));
    setTimeout(() => executor.cancel(job), 300);
    const outcome = await pending;
    expect(outcome.status).toBe("canceled");
  });

  it("removes the workspace afterwards", async () => {
    await executor.dispatch(job, environment({ script: ["touch out.txt"] }));
    expect(readdirSync(workRoot)).toEqual([]);
  });

  it("keeps the workspace when asked", async () => {
    const keeping = new LocalShellExecutor({ workRoot, keepWorkspaces: true, env: { PATH: process.env.PATH } });
    const env = environment({ script: ["touch out.txt"] });
    await keeping.dispatch(job, env);
    expect(existsSync(join(keeping.workspaceFor(env), "out.txt"))).toBe(true);
  });

  it("passes host variables named by the filter options", async () => {
    const filtered = new LocalShellExecutor({
      workRoot,
      envFilterPolicy: "inherit_none",
      envFilter: { include: new Set(["REGISTRY_TOKEN"]) },
      env: { PATH: process.env.PATH, REGISTRY_TOKEN: "test-secret", EDITOR: "vi" },
    });
    const outcome = await filtered.dispatch(
      job,
      environment({ script: ['echo "${REGISTRY_TOKEN}:${EDITOR:-unset}"'] }),
    );
    expect(outcome.log).toBe('$ echo "${REGISTRY_TOKEN}:${EDITOR:-unset}"\ntest-secret:unset\n');
  });

  it("raises a runner failure when the shell cannot start", async () => {
    const broken = new LocalShellExecutor({ workRoot, shell: "/nonexistent/shell" });
    await expect(broken.dispatch(job, environment({ script: ["true"] }))).rejects.toBeInstanceOf(
      RunnerInfrastructureFailure,
    );
  });
});
