import { ConfigurationError } from "@/core/error.core.js";
import type { OutputOptions, Sink } from "@/types/output.js";
import { CircularSink } from "./circular.sink.js";
import { FileSink, eventPathResolver, segmentPathResolver } from "./file.sink.js";
import { NetSink, isNetworkOutput } from "./net.sink.js";
import { NullSink } from "./null.sink.js";

export { CircularSink } from "./circular.sink.js";
export { FileSink, STDOUT_PATH, eventPathResolver, segmentPathResolver } from "./file.sink.js";
export { NetSink } from "./net.sink.js";
export { NullSink } from "./null.sink.js";

/** Picks the primary destination from the output setting. */
export function createPrimarySink(options: Pick<OutputOptions, "output" | "circularMb" | "wrap">): Sink {
  const { output, circularMb, wrap } = options;

  if (isNetworkOutput(output)) {
    return new NetSink(output);
  }

  if (circularMb > 0) {
    if (!output) {
      throw new ConfigurationError("Circular output requires an output path");
    }
    return new CircularSink(output, circularMb);
  }

  if (output) {
    return new FileSink(segmentPathResolver(output, wrap));
  }

  return new NullSink();
}

/** Event recordings and their thumbnails share one file sink. */
export function createEventSink(detectionRecordPath: string): Sink {
  return new FileSink(eventPathResolver(detectionRecordPath));
}
