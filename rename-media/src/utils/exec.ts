import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** exiftool and ffprobe JSON for a single file stays well under this */
const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Runs an external command and resolves with its stdout.
 * Rejects on a missing binary or a non-zero exit.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, {
    encoding: "utf8",
    maxBuffer: MAX_BUFFER,
  });
  return stdout;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
