import type { TimestampWriter } from "@/types/output.js";
import { formatTimecode } from "@/utils/time.util.js";
import { openTextTarget, type TextTarget } from "@/utils/textTarget.util.js";

export const TIMECODE_HEADER = "# timecode format v2\n";

/** One line per forwarded frame, readable by mkvmerge as a v2 timecode file. */
export class PtsFileWriter implements TimestampWriter {
  private readonly target: TextTarget;

  constructor(path: string) {
    this.target = openTextTarget(path);
    this.target.write(TIMECODE_HEADER);
  }

  write(timestampUs: number): void {
    this.target.write(`${formatTimecode(timestampUs)}\n`);
  }

  close(): void {
    this.target.close();
  }
}
