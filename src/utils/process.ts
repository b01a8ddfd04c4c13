import { execFile } from "node:child_process";

export type CommandOutcome =
  | { status: "ok"; stdout: string; stderr: string }
  | { status: "exit"; exitCode: number; stdout: string; stderr: string }
  | { status: "timeout" }
  | { status: "missing" }
  | { status: "aborted" };

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandOutcome>;

// yt-dlp can print a lot of progress on stderr
const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Runs a command without a shell and reports how it ended. Never rejects.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    execFile(
      command,
      args,
      {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeoutMs,
        signal: options?.signal,
        encoding: "utf8",
        maxBuffer: MAX_BUFFER,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ status: "ok", stdout, stderr });
          return;
        }
        const code: unknown = error.code;
        // ENOENT, EACCES, ENOTDIR...: the binary could not be started at all
        if (typeof code === "string" && error.syscall?.startsWith("spawn")) {
          resolve({ status: "missing" });
        } else if (error.name === "AbortError" || options?.signal?.aborted) {
          resolve({ status: "aborted" });
        } else if (error.killed) {
          resolve({ status: "timeout" });
        } else {
          resolve({
            status: "exit",
            exitCode: typeof code === "number" ? code : 1,
            stdout,
            stderr: stderr || error.message,
          });
        }
      }
    );
  });
};
