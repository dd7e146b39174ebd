import { describe, expect, test } from "vitest";
import { type CommandResult, describeFailure, runCommand } from "../../src/process/runner";

const node = process.execPath;

describe("runCommand", () => {
  test("captures stdout and a zero exit code", async () => {
    const result = await runCommand(node, ["-e", "process.stdout.write('hello\\n')"]);

    expect(result).toEqual({
      success: true,
      stdout: "hello",
      stderr: "",
      exitCode: 0,
      timedOut: false,
    });
  });

  test("captures stderr and a non-zero exit code", async () => {
    const result = await runCommand(node, [
      "-e",
      "process.stderr.write('permission denied'); process.exit(2)",
    ]);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe("permission denied");
  });

  test("passes extra environment to the child only", async () => {
    const result = await runCommand(node, ["-e", "process.stdout.write(process.env.VAULT_TOKEN ?? '')"], {
      env: { VAULT_TOKEN: "test-secret" },
    });

    expect(result.stdout).toBe("test-secret");
    expect(process.env.VAULT_TOKEN).not.toBe("test-secret");
  });

  test("kills the child when the timeout elapses", async () => {
    const result = await runCommand(node, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.success).toBe(false);
  });

  test("rejects when the program cannot be started", async () => {
    await expect(runCommand("/nonexistent/raftsnap-test-binary", [])).rejects.toThrow();
  });
});

describe("describeFailure", () => {
  const base: CommandResult = { success: false, stdout: "", stderr: "", exitCode: 1, timedOut: false };

  test("prefers stderr", () => {
    expect(describeFailure({ ...base, stderr: "Error: 403 permission denied" })).toBe(
      "Error: 403 permission denied",
    );
  });

  test("falls back to the exit code", () => {
    expect(describeFailure({ ...base, exitCode: 3 })).toBe("exited with code 3");
  });

  test("reports timeouts", () => {
    expect(describeFailure({ ...base, exitCode: null, timedOut: true }, 30000)).toBe("timed out after 30s");
  });
});
