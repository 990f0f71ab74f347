export enum OutputState {
  DISABLED = "disabled",
  WAITING_KEYFRAME = "waiting_keyframe",
  RUNNING = "running",
}

/** Bit flags passed to sinks alongside every forwarded buffer. */
export enum OutputFlag {
  NONE = 0,
  KEYFRAME = 1,
  RESTART = 2,
}

export enum SinkRole {
  PRIMARY = "primary",
  SECONDARY = "secondary",
  THUMBNAIL = "thumbnail",
}

export enum MetadataFormat {
  TXT = "txt",
  JSON = "json",
}

export enum RecordingStatus {
  CONVERTED = "converted",
  FAILED = "failed",
}
