import { statSync } from "fs";
import { delimiter, isAbsolute, join } from "path";
import { ToolNotFoundError } from "@/utils/errors";
import type { Env } from "./env";

/**
 * Resolved locations of the FFmpeg executables. Built once at startup and
 * handed to the services that spawn them.
 */
export interface MediaToolchain {
  ffmpegPath: string;
  ffprobePath: string;
}

export type ToolchainConfig = Pick<
  Env,
  "FFMPEG_BIN_DIR" | "FFMPEG_PATH" | "FFPROBE_PATH"
>;

export function executableName(tool: string, platform = process.platform): string {
  return platform === "win32" ? `${tool}.exe` : tool;
}

function isFile(candidate: string): boolean {
  try {
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function hasPathSeparator(value: string): boolean {
  return isAbsolute(value) || value.includes("/") || value.includes("\\");
}

function candidatesFor(
  tool: string,
  configured: string,
  binDir: string | undefined,
  searchPath: string,
): string[] {
  if (binDir) {
    return [join(binDir, executableName(tool))];
  }

  if (hasPathSeparator(configured)) {
    return [configured];
  }

  return searchPath
    .split(delimiter)
    .filter((dir) => dir.length > 0)
    .map((dir) => join(dir, executableName(configured)));
}

function resolveExecutable(
  tool: string,
  configured: string,
  binDir: string | undefined,
  searchPath: string,
): string {
  const candidates = candidatesFor(tool, configured, binDir, searchPath);
  const found = candidates.find(isFile);

  if (!found) {
    throw new ToolNotFoundError(tool, candidates);
  }

  return found;
}

export function resolveToolchain(
  config: ToolchainConfig,
  searchPath: string = process.env.PATH ?? "",
): MediaToolchain {
  return {
    ffmpegPath: resolveExecutable(
      "ffmpeg",
      config.FFMPEG_PATH,
      config.FFMPEG_BIN_DIR,
      searchPath,
    ),
    ffprobePath: resolveExecutable(
      "ffprobe",
      config.FFPROBE_PATH,
      config.FFMPEG_BIN_DIR,
      searchPath,
    ),
  };
}
