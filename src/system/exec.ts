import { execFile } from "node:child_process";

export type CommandResult = {
  /** Exit code; 127 when the command does not exist, null when killed by a signal. */
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CommandRunner = (command: string, args: string[], opts?: { timeoutMs?: number }) => Promise<CommandResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

/** Run a command without a shell. A non-zero exit resolves rather than rejects. */
export const runCommand: CommandRunner = (command, args, opts) =>
  new Promise((resolve) => {
    execFile(
      command,
      args,
      { encoding: "utf8", timeout: opts?.timeoutMs ?? 0, maxBuffer: MAX_BUFFER },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ code: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (err.code === "ENOENT") {
          resolve({ code: 127, stdout: "", stderr: `${command}: command not found`, timedOut: false });
          return;
        }
        resolve({
          code: typeof err.code === "number" ? err.code : null,
          stdout,
          stderr: stderr || err.message,
          timedOut: err.killed === true && err.signal === "SIGTERM" && (opts?.timeoutMs ?? 0) > 0,
        });
      },
    );
  });

export async function commandExists(command: string, run: CommandRunner = runCommand): Promise<boolean> {
  const result = await run("which", [command]);
  return result.code === 0;
}
