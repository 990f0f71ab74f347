import { describe, expect, it } from "vitest";
import { formatDateFolder, formatFileStamp, formatTimecode } from "@/utils/time.util.js";

describe("time utils", () => {
  const date = new Date(2025, 0, 24, 23, 4, 1, 123);

  it("formats the day folder and file stamp in local time", () => {
    expect(formatDateFolder(date)).toBe("2025-01-24");
    expect(formatFileStamp(date)).toBe("2025-01-24-23-04-01-123");
  });

  it("formats microseconds as a v2 timecode", () => {
    expect(formatTimecode(0)).toBe("0.000");
    expect(formatTimecode(33_333)).toBe("33.333");
    expect(formatTimecode(1_234_567)).toBe("1234.567");
    expect(formatTimecode(-1_500)).toBe("-1.500");
  });
});
