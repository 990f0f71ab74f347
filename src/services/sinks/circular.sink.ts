import fs from "node:fs";
import { OutputWriteError } from "@/core/error.core.js";
import { OutputFlag } from "@/enums/output.enum.js";
import type { Sink, SinkHandle } from "@/types/output.js";

interface RetainedFrame {
  data: Buffer;
  keyframe: boolean;
}

export interface CircularHandle extends SinkHandle {
  readonly path: string;
  frames: RetainedFrame[];
  bytes: number;
  open: boolean;
}

/**
 * Keeps only the most recent `sizeMb` of output in memory and writes it to the
 * output file, from the oldest retained keyframe on, when closed.
 */
export class CircularSink implements Sink<CircularHandle> {
  readonly kind = "circular";
  readonly capacityBytes: number;

  constructor(
    private readonly output: string,
    sizeMb: number,
  ) {
    this.capacityBytes = Math.floor(sizeMb * 1024 * 1024);
  }

  open(): CircularHandle {
    return { path: this.output, frames: [], bytes: 0, open: true };
  }

  write(handle: CircularHandle, bytes: Uint8Array, _timestampUs: number, flags: number): void {
    if (!handle.open) {
      throw new OutputWriteError(handle.path, { cause: new Error("Circular buffer is closed") });
    }

    handle.frames.push({ data: Buffer.from(bytes), keyframe: (flags & OutputFlag.KEYFRAME) !== 0 });
    handle.bytes += bytes.byteLength;

    while (handle.bytes > this.capacityBytes && handle.frames.length > 1) {
      const evicted = handle.frames.shift();
      if (evicted) handle.bytes -= evicted.data.byteLength;
    }
  }

  close(handle: CircularHandle): void {
    if (!handle.open) return;
    handle.open = false;

    const start = handle.frames.findIndex((frame) => frame.keyframe);
    const retained = start < 0 ? [] : handle.frames.slice(start);
    handle.frames = [];
    handle.bytes = 0;

    try {
      fs.writeFileSync(handle.path, Buffer.concat(retained.map((frame) => frame.data)));
    } catch (err) {
      throw new OutputWriteError(handle.path, { cause: err });
    }
    console.log(`[CircularSink] Wrote ${retained.length} frames to ${handle.path}`);
  }

  isOpen(handle: CircularHandle): boolean {
    return handle.open;
  }
}
