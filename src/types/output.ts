import type { MetadataFormat, OutputState, SinkRole } from "@/enums/output.enum.js";

export interface Frame {
  data: Uint8Array;
  timestampUs: number;
  keyframe: boolean;
}

export interface DestinationHint {
  role: SinkRole;
  /** Output-timeline timestamp of the frame that caused the open. */
  timestampUs: number;
  wallClock: Date;
  /** Artifact the new destination belongs to (the recording a thumbnail is taken from). */
  relatedPath?: string;
}

export interface SinkHandle {
  readonly path: string | null;
}

export interface Sink<THandle extends SinkHandle = SinkHandle> {
  readonly kind: string;
  open(hint: DestinationHint): THandle;
  write(handle: THandle, bytes: Uint8Array, timestampUs: number, flags: number): void;
  close(handle: THandle): void;
  isOpen(handle: THandle): boolean;
}

export interface Notifier {
  send(bytes: Uint8Array, timestampUs: number): Promise<void>;
}

export interface TranscodeResult {
  rawPath: string;
  outputPath: string;
  success: boolean;
  error?: string;
}

export interface TranscodeHandoff {
  submit(rawPath: string): void;
  cancelAll(): void;
}

export type MetadataValue = string | number | boolean | null | MetadataValue[];
export type MetadataRecord = Record<string, MetadataValue>;

export interface MetadataWriter {
  readonly format: MetadataFormat;
  start(): void;
  write(record: MetadataRecord): void;
  stop(): void;
}

export interface TimestampWriter {
  write(timestampUs: number): void;
  close(): void;
}

export interface OutputOptions {
  output: string;
  segmentMs: number;
  split: boolean;
  wrap: number;
  circularMb: number;
  pause: boolean;
  savePts: string;
  metadata: string;
  metadataFormat: MetadataFormat;
  framerate: number;
  preDetectionSecs: number;
  detectionRecordSecs: number;
  detectionRecordPath: string;
}

export interface EventSessionStatus {
  sequenceId: number;
  startUs: number;
  endUs: number;
  artifactPath: string | null;
}

export interface OutputStatus {
  state: OutputState;
  enabled: boolean;
  timeOffsetUs: number;
  lastTimestampUs: number;
  preBuffer: { size: number; capacity: number };
  session: EventSessionStatus | null;
}
