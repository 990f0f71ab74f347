import { MetadataFormat } from "@/enums/output.enum.js";
import type { MetadataRecord, MetadataValue, MetadataWriter } from "@/types/output.js";
import { openTextTarget, type TextTarget } from "@/utils/textTarget.util.js";

function formatTextValue(value: MetadataValue): string {
  if (Array.isArray(value)) return `[ ${value.map(formatTextValue).join(", ")} ]`;
  return String(value);
}

/** `key=value` lines, one blank line between frames. */
export class TextMetadataWriter implements MetadataWriter {
  readonly format = MetadataFormat.TXT;

  constructor(private readonly target: TextTarget) {}

  start(): void {}

  write(record: MetadataRecord): void {
    const lines = Object.entries(record).map(([key, value]) => `${key}=${formatTextValue(value)}\n`);
    this.target.write(lines.join("") + "\n");
  }

  stop(): void {
    this.target.close();
  }
}

/** A JSON array with one object per frame, streamed as frames arrive. */
export class JsonMetadataWriter implements MetadataWriter {
  readonly format = MetadataFormat.JSON;
  private started = false;

  constructor(private readonly target: TextTarget) {}

  start(): void {
    this.target.write("[\n");
  }

  write(record: MetadataRecord): void {
    const fields = Object.entries(record).map(([key, value]) => `\n    ${JSON.stringify(key)}: ${JSON.stringify(value)}`);
    this.target.write(`${this.started ? ",\n" : ""}{${fields.join(",")}\n}`);
    this.started = true;
  }

  stop(): void {
    this.target.write("\n]\n");
    this.target.close();
  }
}

export function createMetadataWriter(format: MetadataFormat, path: string): MetadataWriter {
  const target = openTextTarget(path);
  switch (format) {
    case MetadataFormat.TXT:
      return new TextMetadataWriter(target);
    case MetadataFormat.JSON:
      return new JsonMetadataWriter(target);
  }
}
