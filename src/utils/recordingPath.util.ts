import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { formatDateFolder, formatFileStamp } from "@/utils/time.util.js";

export const RAW_RECORDING_EXTENSION = ".mjpeg";
export const THUMBNAIL_EXTENSION = ".jpg";

export function expandTilde(target: string, homeDir: string = os.homedir()): string {
  if (target !== "~" && !target.startsWith("~/")) return target;
  if (!homeDir) return target;
  return homeDir + target.slice(1);
}

export function replaceExtension(target: string, extension: string): string {
  const parsed = path.parse(target);
  if (!parsed.ext) return target + extension;
  return path.join(parsed.dir, parsed.name + extension);
}

/**
 * Builds `<base>/<YYYY-MM-DD>/<YYYY-MM-DD-HH-mm-ss-SSS>.mjpeg`, creating the
 * day folder when needed.
 */
export function eventRecordingPath(basePath: string, wallClock: Date): string {
  const base = expandTilde(basePath) || ".";
  const folder = path.join(base, formatDateFolder(wallClock));

  fs.mkdirSync(folder, { recursive: true });

  return path.join(folder, formatFileStamp(wallClock) + RAW_RECORDING_EXTENSION);
}
