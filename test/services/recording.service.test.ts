import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RecordingStatus } from "@/enums/output.enum.js";
import {
  RecordingService,
  toRecordingEntry,
  type RecordingEntry,
  type RecordingRepository,
} from "@/services/recording.service.js";
import { TranscodeManager } from "@/services/transcode.service.js";

class InMemoryRecordingRepository implements RecordingRepository {
  readonly entries: RecordingEntry[] = [];

  async save(entry: RecordingEntry): Promise<void> {
    this.entries.push(entry);
  }

  async list(limit: number): Promise<RecordingEntry[]> {
    return this.entries.slice(-limit).reverse();
  }
}

describe("RecordingService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds catalogue entries from transcode results", () => {
    const createdAt = new Date(2025, 0, 24);

    expect(
      toRecordingEntry(
        { rawPath: "/rec/a.mjpeg", outputPath: "/rec/a.mp4", success: false, error: "ffmpeg exited with code 1" },
        createdAt,
      ),
    ).toEqual({
      raw_path: "/rec/a.mjpeg",
      output_path: "/rec/a.mp4",
      thumbnail_path: "/rec/a.jpg",
      status: RecordingStatus.FAILED,
      error: "ffmpeg exited with code 1",
      created_at: createdAt,
    });
  });

  it("stores every finished transcode", async () => {
    const repository = new InMemoryRecordingRepository();
    const service = new RecordingService(repository);
    const transcoder = new TranscodeManager();
    service.attach(transcoder);

    transcoder.emit("done", { rawPath: "/rec/a.mjpeg", outputPath: "/rec/a.mp4", success: true });
    transcoder.emit("done", { rawPath: "/rec/b.mjpeg", outputPath: "/rec/b.mp4", success: false, error: "killed" });

    await vi.waitFor(() => expect(repository.entries).toHaveLength(2));

    const listed = await service.list(1);
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ raw_path: "/rec/b.mjpeg", status: RecordingStatus.FAILED, error: "killed" });
    expect(repository.entries[0]).toMatchObject({ status: RecordingStatus.CONVERTED, error: null });
  });
});
