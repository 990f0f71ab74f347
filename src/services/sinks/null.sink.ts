import type { Sink, SinkHandle } from "@/types/output.js";

/** Used when no output is configured: every buffer is accepted and dropped. */
export class NullSink implements Sink {
  readonly kind = "null";

  open(): SinkHandle {
    return { path: null };
  }

  write(): void {}

  close(): void {}

  isOpen(): boolean {
    return true;
  }
}
