import type { Frame } from "@/types/output.js";

export interface BufferedFrame {
  data: Buffer;
  timestampUs: number;
  keyframe: boolean;
}

export function preBufferCapacity(preEventSecs: number, framerate: number): number {
  if (preEventSecs <= 0 || framerate <= 0) return 0;
  // toFixed drops float noise such as 0.1 * 30 = 3.0000000000000004
  return Math.ceil(Number((preEventSecs * framerate).toFixed(6)));
}

/**
 * Bounded FIFO of owned frame copies covering the last few seconds of input,
 * used to backfill an event recording with what happened before the trigger.
 */
export class PreEventBuffer {
  readonly capacity: number;
  private frames: BufferedFrame[] = [];

  constructor(preEventSecs: number, framerate: number) {
    this.capacity = preBufferCapacity(preEventSecs, framerate);
  }

  get size(): number {
    return this.frames.length;
  }

  get enabled(): boolean {
    return this.capacity > 0;
  }

  push(frame: Frame): void {
    if (!this.enabled) return;

    this.frames.push({
      data: Buffer.from(frame.data),
      timestampUs: frame.timestampUs,
      keyframe: frame.keyframe,
    });

    while (this.frames.length > this.capacity) {
      this.frames.shift();
    }
  }

  /**
   * Removes every retained frame and returns, oldest first, those stamped
   * strictly before `cutoffUs`.
   */
  drainBefore(cutoffUs: number): BufferedFrame[] {
    const drained: BufferedFrame[] = [];
    for (const frame of this.frames) {
      if (frame.timestampUs >= cutoffUs) break;
      drained.push(frame);
    }
    this.frames = [];
    return drained;
  }

  snapshot(): readonly BufferedFrame[] {
    return [...this.frames];
  }
}
