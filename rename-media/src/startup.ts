import type { RenameOptions } from "./config/types.js";
import { VARIANTS } from "./config/defaults.js";
import { type CommandRunner, runCommand } from "./utils/exec.js";

export interface OptionalTool {
  command: string;
  versionFlag: string;
  purpose: string;
  installHint: string;
}

/**
 * External tools a run would use. The videos variant never reads device tags.
 */
export function toolsFor(options: RenameOptions): OptionalTool[] {
  const tools: OptionalTool[] = [];

  if (VARIANTS[options.variant].detectDeviceFromMetadata) {
    tools.push({
      command: options.tools.exiftool,
      versionFlag: "-ver",
      purpose: "device detection from Make/Model tags",
      installHint:
        "Ubuntu/Debian: sudo apt install libimage-exiftool-perl\n" +
        "    macOS: brew install exiftool\n" +
        "    Windows: https://exiftool.org",
    });
  }

  tools.push({
    command: options.tools.ffprobe,
    versionFlag: "-version",
    purpose: "capture time from container metadata",
    installHint:
      "Ubuntu/Debian: sudo apt install ffmpeg\n" +
      "    macOS: brew install ffmpeg\n" +
      "    Windows: https://ffmpeg.org/download.html",
  });

  return tools;
}

/**
 * Return the tools that do not answer a version query.
 * Missing tools are not fatal: the run falls back to extension and mtime.
 */
export async function findMissingTools(
  tools: OptionalTool[],
  run: CommandRunner = runCommand
): Promise<OptionalTool[]> {
  const missing: OptionalTool[] = [];

  for (const tool of tools) {
    try {
      await run(tool.command, [tool.versionFlag]);
    } catch {
      missing.push(tool);
    }
  }

  return missing;
}

export function describeMissingTools(missing: OptionalTool[]): string {
  const details = missing
    .map((t) => `  ${t.command} (${t.purpose}):\n    ${t.installHint}`)
    .join("\n\n");
  return `Optional tool(s) not found, falling back to file extension and modification time:\n\n${details}`;
}
