import { spawn } from "child_process";

export type ExecOptions = {
  /** Seconds before the process is killed; 0 or omitted waits forever */
  timeout?: number;
  cwd?: string;
  env?: Record<string, string>;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Base error class for command execution errors
 */
export class CommandError extends Error {
  public readonly command: string;

  constructor(message: string, command: string) {
    super(message);
    this.name = "CommandError";
    this.command = command;
    Object.setPrototypeOf(this, CommandError.prototype);
  }
}

/**
 * The command outlived its deadline and was killed.
 */
export class CommandTimeoutError extends CommandError {
  public readonly timeoutSeconds: number;

  constructor(command: string, timeoutSeconds: number) {
    super(`Command timed out after ${timeoutSeconds} seconds`, command);
    this.name = "CommandTimeoutError";
    this.timeoutSeconds = timeoutSeconds;
    Object.setPrototypeOf(this, CommandTimeoutError.prototype);
  }
}

/**
 * The command could not be started at all.
 */
export class CommandExecutionError extends CommandError {
  constructor(command: string, cause: string) {
    super(`Failed to execute command: ${cause}`, command);
    this.name = "CommandExecutionError";
    Object.setPrototypeOf(this, CommandExecutionError.prototype);
  }
}

const isWindows = process.platform === "win32";

/**
 * Runs `command` through the system shell and collects its output.
 *
 * A non-zero exit is a normal result. On timeout the whole process group is
 * killed and the promise rejects with CommandTimeoutError; output gathered so
 * far is discarded.
 */
export function execCommand(command: string, options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise<ExecResult>((resolve, reject) => {
    const proc = spawn(command, {
      shell: true,
      cwd: options.cwd ?? process.cwd(),
      env: { ...process.env, ...options.env },
      // own process group so a timeout can take the shell's children with it
      detached: !isWindows,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (action: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      action();
    };

    proc.stdout?.on("data", (data: Buffer) => { stdout += data.toString(); });
    proc.stderr?.on("data", (data: Buffer) => { stderr += data.toString(); });

    proc.on("close", (code: number | null) => {
      finish(() => resolve({ exitCode: code ?? 1, stdout, stderr }));
    });

    proc.on("error", (error: Error) => {
      finish(() => reject(new CommandExecutionError(command, error.message)));
    });

    const timeout = options.timeout ?? 0;
    if (timeout > 0) {
      timer = setTimeout(() => {
        finish(() => {
          killProcessTree(proc.pid, () => proc.kill("SIGKILL"));
          reject(new CommandTimeoutError(command, timeout));
        });
      }, timeout * 1000);
    }
  });
}

function killProcessTree(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || isWindows) {
    fallback();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch {
    fallback();
  }
}
