import { spawn } from "node:child_process";

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** No timeout when omitted or non-positive. */
  timeoutMs?: number;
  input?: string;
};

export type SpawnResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the process was killed because it ran past `timeoutMs`. */
  killed: boolean;
  stdout: string;
  stderr: string;
};

const KILL_GRACE_MS = 1_000;

/**
 * Spawn `argv[0]` without a shell, collect stdout/stderr and wait for it to exit.
 * On timeout the child gets SIGTERM, then SIGKILL after a short grace period.
 * Rejects only when the process cannot be started at all.
 */
export function runCommandWithTimeout(
  argv: string[],
  options: CommandOptions = {},
): Promise<SpawnResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error("runCommandWithTimeout: empty argv"));
  }

  return new Promise<SpawnResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let killed = false;
    let killTimer: NodeJS.Timeout | undefined;

    // Decode across chunk boundaries so split multibyte characters survive.
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr.on("data", (data: string) => {
      stderr += data;
    });

    // The child may exit before reading its input.
    child.stdin.on("error", () => undefined);
    if (options.input !== undefined) {
      child.stdin.write(options.input);
    }
    child.stdin.end();

    const timeoutMs = options.timeoutMs ?? 0;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            killed = true;
            child.kill("SIGTERM");
            killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
          }, timeoutMs)
        : undefined;

    const clearTimers = () => {
      if (timer) {
        clearTimeout(timer);
      }
      if (killTimer) {
        clearTimeout(killTimer);
      }
    };

    child.on("error", (err) => {
      clearTimers();
      reject(err);
    });

    child.on("close", (code, signal) => {
      clearTimers();
      resolve({ code, signal, killed, stdout, stderr });
    });
  });
}
