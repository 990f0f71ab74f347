import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { eventRecordingPath, expandTilde, replaceExtension } from "@/utils/recordingPath.util.js";

describe("recording paths", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "recording-path-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("expands a leading tilde only", () => {
    expect(expandTilde("~/recordings", "/home/test")).toBe("/home/test/recordings");
    expect(expandTilde("~", "/home/test")).toBe("/home/test");
    expect(expandTilde("~other/recordings", "/home/test")).toBe("~other/recordings");
    expect(expandTilde("/var/recordings", "/home/test")).toBe("/var/recordings");
  });

  it("replaces or appends an extension", () => {
    expect(replaceExtension("/rec/2025-01-24/a.mjpeg", ".jpg")).toBe("/rec/2025-01-24/a.jpg");
    expect(replaceExtension("/rec/a", ".mp4")).toBe("/rec/a.mp4");
  });

  it("names recordings by wall clock inside a day folder it creates", () => {
    const wallClock = new Date(2025, 0, 24, 23, 4, 1, 123);

    const target = eventRecordingPath(tmpDir, wallClock);

    expect(target).toBe(path.join(tmpDir, "2025-01-24", "2025-01-24-23-04-01-123.mjpeg"));
    expect(fs.statSync(path.join(tmpDir, "2025-01-24")).isDirectory()).toBe(true);
  });
});
