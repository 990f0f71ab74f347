import { describe, expect, it } from "vitest";
import { formatSegmentPath, hasCounter } from "@/utils/pathTemplate.util.js";

describe("segment path templates", () => {
  it("fills plain and padded counters", () => {
    expect(formatSegmentPath("seg%d.ts", 12)).toBe("seg12.ts");
    expect(formatSegmentPath("video%04d.h264", 7)).toBe("video0007.h264");
    expect(formatSegmentPath("video%3d.h264", 5)).toBe("video  5.h264");
  });

  it("detects whether a template has a counter", () => {
    expect(hasCounter("video%04d.h264")).toBe(true);
    expect(hasCounter("video.h264")).toBe(false);
    expect(formatSegmentPath("video.h264", 3)).toBe("video.h264");
  });
});
