import fs from "node:fs";
import { OutputOpenError, OutputWriteError } from "@/core/error.core.js";

export interface TextTarget {
  readonly path: string;
  write(text: string): void;
  close(): void;
}

/** Opens `target` for writing; `-` writes to stdout. */
export function openTextTarget(target: string): TextTarget {
  const toStdout = target === "-";
  let fd: number | null;

  try {
    fd = toStdout ? process.stdout.fd : fs.openSync(target, "w");
  } catch (err) {
    throw new OutputOpenError(target, { cause: err });
  }

  return {
    path: target,
    write(text) {
      if (fd === null) throw new OutputWriteError(target, { cause: new Error("Target is closed") });
      try {
        fs.writeSync(fd, text);
      } catch (err) {
        throw new OutputWriteError(target, { cause: err });
      }
    },
    close() {
      if (fd === null) return;
      if (!toStdout) fs.closeSync(fd);
      fd = null;
    },
  };
}
