import { RecordingStatus } from "@/enums/output.enum.js";
import recordingModel from "@/models/recording.model.js";
import type { TranscodeManager } from "@/services/transcode.service.js";
import type { TranscodeResult } from "@/types/output.js";
import { THUMBNAIL_EXTENSION, replaceExtension } from "@/utils/recordingPath.util.js";

export interface RecordingEntry {
  raw_path: string;
  output_path: string;
  thumbnail_path: string;
  status: RecordingStatus;
  error: string | null;
  created_at: Date;
}

export interface RecordingRepository {
  save(entry: RecordingEntry): Promise<void>;
  list(limit: number): Promise<RecordingEntry[]>;
}

export class MongoRecordingRepository implements RecordingRepository {
  async save(entry: RecordingEntry): Promise<void> {
    await recordingModel.create(entry);
  }

  async list(limit: number): Promise<RecordingEntry[]> {
    const docs = await recordingModel.find({}).sort({ created_at: -1 }).limit(limit).lean();

    return docs.map((doc) => ({
      raw_path: doc.raw_path,
      output_path: doc.output_path,
      thumbnail_path: doc.thumbnail_path,
      status: doc.status === RecordingStatus.CONVERTED ? RecordingStatus.CONVERTED : RecordingStatus.FAILED,
      error: doc.error ?? null,
      created_at: doc.created_at,
    }));
  }
}

export function toRecordingEntry(result: TranscodeResult, createdAt: Date = new Date()): RecordingEntry {
  return {
    raw_path: result.rawPath,
    output_path: result.outputPath,
    thumbnail_path: replaceExtension(result.rawPath, THUMBNAIL_EXTENSION),
    status: result.success ? RecordingStatus.CONVERTED : RecordingStatus.FAILED,
    error: result.error ?? null,
    created_at: createdAt,
  };
}

/** Catalogue of finished event recordings, fed by transcode outcomes. */
export class RecordingService {
  constructor(private readonly repository: RecordingRepository) {}

  attach(transcoder: TranscodeManager): void {
    transcoder.on("done", (result) => {
      this.record(result).catch((err: unknown) => {
        console.error(`[Recording] Failed to save recording ${result.rawPath}:`, err);
      });
    });
  }

  async record(result: TranscodeResult): Promise<RecordingEntry> {
    const entry = toRecordingEntry(result);
    await this.repository.save(entry);
    console.log(`[Recording] Saved ${entry.status} recording ${entry.output_path}`);
    return entry;
  }

  list(limit = 50): Promise<RecordingEntry[]> {
    return this.repository.list(limit);
  }
}
