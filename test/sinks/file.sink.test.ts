import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OutputOpenError, OutputWriteError } from "@/core/error.core.js";
import { SinkRole } from "@/enums/output.enum.js";
import { FileSink, eventPathResolver, segmentPathResolver } from "@/services/sinks/file.sink.js";

const hint = (role: SinkRole, relatedPath?: string) => ({
  role,
  timestampUs: 0,
  wallClock: new Date(2025, 0, 24, 23, 4, 1, 123),
  relatedPath,
});

describe("FileSink", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-sink-"));
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes every buffer to the opened file", () => {
    const sink = new FileSink(() => path.join(tmpDir, "out.bin"));

    const handle = sink.open(hint(SinkRole.PRIMARY));
    sink.write(handle, Uint8Array.of(1, 2), 0, 0);
    sink.write(handle, Uint8Array.of(3), 1_000, 0);
    sink.close(handle);

    expect(Array.from(fs.readFileSync(path.join(tmpDir, "out.bin")))).toEqual([1, 2, 3]);
    expect(sink.isOpen(handle)).toBe(false);
  });

  it("fails writes after close", () => {
    const sink = new FileSink(() => path.join(tmpDir, "out.bin"));
    const handle = sink.open(hint(SinkRole.PRIMARY));
    sink.close(handle);

    expect(() => sink.write(handle, Uint8Array.of(1), 0, 0)).toThrow(OutputWriteError);
  });

  it("wraps open failures", () => {
    const sink = new FileSink(() => path.join(tmpDir, "missing", "out.bin"));

    expect(() => sink.open(hint(SinkRole.PRIMARY))).toThrow(OutputOpenError);
  });

  it("reports a recording folder that cannot be created as an open failure", () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "");
    const sink = new FileSink(eventPathResolver(blocker));

    expect(() => sink.open(hint(SinkRole.SECONDARY))).toThrow(OutputOpenError);
    expect(() => sink.open(hint(SinkRole.SECONDARY))).toThrow("Failed to open output secondary output");
  });

  it("numbers segments and wraps the counter", () => {
    const resolve = segmentPathResolver(path.join(tmpDir, "seg%02d.bin"), 2);

    const names = [0, 1, 2].map(() => path.basename(resolve(hint(SinkRole.PRIMARY))));

    expect(names).toEqual(["seg00.bin", "seg01.bin", "seg00.bin"]);
  });

  it("puts thumbnails beside their recording", () => {
    const resolve = eventPathResolver(tmpDir);

    const recording = resolve(hint(SinkRole.SECONDARY));
    const thumbnail = resolve(hint(SinkRole.THUMBNAIL, recording));

    expect(recording).toBe(path.join(tmpDir, "2025-01-24", "2025-01-24-23-04-01-123.mjpeg"));
    expect(thumbnail).toBe(path.join(tmpDir, "2025-01-24", "2025-01-24-23-04-01-123.jpg"));
  });
});
