import fs from "node:fs";
import { OutputOpenError, OutputWriteError } from "@/core/error.core.js";
import { SinkRole } from "@/enums/output.enum.js";
import type { DestinationHint, Sink, SinkHandle } from "@/types/output.js";
import { formatSegmentPath, hasCounter } from "@/utils/pathTemplate.util.js";
import {
  THUMBNAIL_EXTENSION,
  eventRecordingPath,
  replaceExtension,
} from "@/utils/recordingPath.util.js";

export const STDOUT_PATH = "-";

export type PathResolver = (hint: DestinationHint) => string;

export interface FileHandle extends SinkHandle {
  readonly path: string;
  fd: number | null;
}

/**
 * Writes each buffer straight to a file descriptor. Writes are synchronous so
 * a failure surfaces to whoever delivered the frame.
 */
export class FileSink implements Sink<FileHandle> {
  readonly kind = "file";

  constructor(private readonly resolvePath: PathResolver) {}

  open(hint: DestinationHint): FileHandle {
    let target: string | null = null;

    try {
      // Resolving may create folders, so it fails like an open
      target = this.resolvePath(hint);
      if (target === STDOUT_PATH) {
        return { path: target, fd: process.stdout.fd };
      }

      const fd = fs.openSync(target, "w");
      console.debug(`[FileSink] Opened ${target}`);
      return { path: target, fd };
    } catch (err) {
      throw new OutputOpenError(target ?? `${hint.role} output`, { cause: err });
    }
  }

  write(handle: FileHandle, bytes: Uint8Array, _timestampUs: number, _flags: number): void {
    if (handle.fd === null) {
      throw new OutputWriteError(handle.path, { cause: new Error("File is closed") });
    }
    if (bytes.byteLength === 0) return;

    try {
      let offset = 0;
      while (offset < bytes.byteLength) {
        offset += fs.writeSync(handle.fd, bytes, offset, bytes.byteLength - offset);
      }
    } catch (err) {
      throw new OutputWriteError(handle.path, { cause: err });
    }
  }

  close(handle: FileHandle): void {
    if (handle.fd === null) return;

    const fd = handle.fd;
    handle.fd = null;
    if (handle.path !== STDOUT_PATH) {
      fs.closeSync(fd);
    }
  }

  isOpen(handle: FileHandle): boolean {
    return handle.fd !== null;
  }
}

/**
 * Primary output naming: a printf-like template whose `%d` counter advances
 * on every open and wraps at `wrap` when that is non-zero.
 */
export function segmentPathResolver(template: string, wrap = 0): PathResolver {
  let count = 0;

  if (!hasCounter(template) && template !== STDOUT_PATH) {
    console.debug(`[FileSink] Output "${template}" has no counter, segments will overwrite it`);
  }

  return () => {
    const target = formatSegmentPath(template, count);
    count++;
    if (wrap > 0) count %= wrap;
    return target;
  };
}

/** Event recordings go to day folders under `basePath`; thumbnails sit beside them. */
export function eventPathResolver(basePath: string): PathResolver {
  return (hint) => {
    if (hint.role === SinkRole.THUMBNAIL) {
      const recording = hint.relatedPath ?? eventRecordingPath(basePath, hint.wallClock);
      return replaceExtension(recording, THUMBNAIL_EXTENSION);
    }
    return eventRecordingPath(basePath, hint.wallClock);
  };
}
