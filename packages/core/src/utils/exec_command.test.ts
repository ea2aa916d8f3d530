import * as fs from "fs/promises";
import * as path from "path";
import * as os from "os";
import { CommandExecutionError, CommandTimeoutError, execCommand } from "./exec_command";

describe("execCommand", () => {
  it("should collect stdout and a zero exit code", async () => {
    const result = await execCommand("echo hello");

    expect(result).toEqual({ exitCode: 0, stdout: "hello\n", stderr: "" });
  });

  it("should report non-zero exit codes as results", async () => {
    const result = await execCommand("echo oops 1>&2; exit 3");

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe("oops\n");
  });

  it("should run in the given working directory with extra env", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "exec-test-"));
    try {
      const realDir = await fs.realpath(tempDir);
      const result = await execCommand("pwd && echo $TASKLOOM_TEST_VAR", {
        cwd: tempDir,
        env: { TASKLOOM_TEST_VAR: "placeholder" },
      });

      expect(result.stdout).toBe(`${realDir}\nplaceholder\n`);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it("should kill a command that outlives its timeout", async () => {
    const started = Date.now();

    const outcome = execCommand("sleep 5", { timeout: 1 });

    await expect(outcome).rejects.toThrow(CommandTimeoutError);
    await expect(outcome).rejects.toThrow("Command timed out after 1 seconds");
    expect(Date.now() - started).toBeLessThan(3000);
  });

  it("should reject when the working directory does not exist", async () => {
    await expect(
      execCommand("echo hi", { cwd: path.join(os.tmpdir(), "taskloom-missing-dir-for-test") })
    ).rejects.toThrow(CommandExecutionError);
  });
});
