/**
 * Command execution for the docker CLI tools.
 */

import { exec } from "child_process";

export type CommandResult = {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  signal?: AbortSignal,
) => Promise<CommandResult>;

export const execCmd: CommandRunner = (command, signal) =>
  new Promise((resolve) => {
    exec(command, { signal }, (error, stdout, stderr) => {
      let exitCode = 0;
      let killedBy: string | null = null;

      if (error) {
        exitCode = typeof error.code === "number" ? error.code : 1;
        killedBy = error.signal ?? (error.name === "AbortError" ? "SIGTERM" : null);
      }

      resolve({
        success: exitCode === 0 && !killedBy,
        exitCode,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
