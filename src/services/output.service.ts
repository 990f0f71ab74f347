import { ContractViolationError } from "@/core/error.core.js";
import { OutputFlag, OutputState, SinkRole } from "@/enums/output.enum.js";
import { createMetadataWriter } from "@/services/metadata.service.js";
import { PreEventBuffer } from "@/services/preBuffer.service.js";
import { createEventSink, createPrimarySink } from "@/services/sinks/index.js";
import { PtsFileWriter } from "@/services/timestamp.service.js";
import type {
  Frame,
  MetadataRecord,
  MetadataWriter,
  Notifier,
  OutputOptions,
  OutputStatus,
  Sink,
  SinkHandle,
  TimestampWriter,
  TranscodeHandoff,
} from "@/types/output.js";

export interface OutputControllerDeps {
  primarySink: Sink;
  /** Receives event recordings and their thumbnails. */
  eventSink: Sink;
  notifier?: Notifier | null;
  transcoder?: TranscodeHandoff | null;
  metadataWriter?: MetadataWriter | null;
  timestampWriter?: TimestampWriter | null;
  now?: () => Date;
}

export type OutputControllerSettings = Pick<
  OutputOptions,
  "segmentMs" | "split" | "pause" | "framerate" | "preDetectionSecs" | "detectionRecordSecs"
>;

interface EventSession {
  sequenceId: number;
  /** Raw timestamp bounding the pre-event backfill; null takes everything retained. */
  cutoffRawUs: number | null;
  startUs: number;
  endUs: number;
  handle: SinkHandle;
  pendingFlush: boolean;
  firstFramePending: boolean;
}

const keyframeFlag = (keyframe: boolean) => (keyframe ? OutputFlag.KEYFRAME : OutputFlag.NONE);

/**
 * Sits between the encoder and the sinks. Gates the primary output on
 * keyframes, keeps its timeline continuous across pause/resume, rotates
 * destinations, and runs the detection-triggered event recording.
 *
 * Every method is synchronous; the notifier and the transcode are handed
 * copies of what they need and run in the background.
 */
export class OutputController {
  readonly preBuffer: PreEventBuffer;

  private state = OutputState.WAITING_KEYFRAME;
  private enabled: boolean;
  private timeOffsetUs = 0;
  private lastTimestampUs = 0;
  private lastRawTimestampUs: number | null = null;

  private primaryHandle: SinkHandle | null = null;
  private segmentStartMs = 0;

  private session: EventSession | null = null;
  private pendingNotification: number | null = null;
  private readonly metadataQueue: MetadataRecord[] = [];
  private closed = false;

  private readonly primarySink: Sink;
  private readonly eventSink: Sink;
  private readonly notifier: Notifier | null;
  private readonly transcoder: TranscodeHandoff | null;
  private readonly metadataWriter: MetadataWriter | null;
  private readonly timestampWriter: TimestampWriter | null;
  private readonly now: () => Date;

  constructor(
    private readonly settings: OutputControllerSettings,
    deps: OutputControllerDeps,
  ) {
    this.primarySink = deps.primarySink;
    this.eventSink = deps.eventSink;
    this.notifier = deps.notifier ?? null;
    this.transcoder = deps.transcoder ?? null;
    this.metadataWriter = deps.metadataWriter ?? null;
    this.timestampWriter = deps.timestampWriter ?? null;
    this.now = deps.now ?? (() => new Date());

    this.enabled = !settings.pause;
    this.preBuffer = new PreEventBuffer(settings.preDetectionSecs, settings.framerate);
    this.metadataWriter?.start();
  }

  /* -------------------------------------------------------------------------- */
  /*                                   Ingress                                  */
  /* -------------------------------------------------------------------------- */
  deliver(frame: Frame): void {
    if (this.closed) {
      throw new ContractViolationError("Frame delivered after the output was closed");
    }
    if (this.lastRawTimestampUs !== null && frame.timestampUs <= this.lastRawTimestampUs) {
      throw new ContractViolationError(
        `Frame timestamp ${frame.timestampUs} does not follow ${this.lastRawTimestampUs}`,
      );
    }
    this.lastRawTimestampUs = frame.timestampUs;

    try {
      this.flushPreEvent(frame);
      this.forward(frame);
    } finally {
      // After forwarding, so a pending flush never includes the frame it is triggered by
      this.preBuffer.push(frame);
    }
  }

  setEnabled(enabled: boolean): void {
    if (enabled !== this.enabled) {
      console.log(`[Output] Output ${enabled ? "resumed" : "paused"}`);
    }
    this.enabled = enabled;
  }

  toggle(): boolean {
    this.setEnabled(!this.enabled);
    return this.enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  attachMetadata(record: MetadataRecord): void {
    if (!this.metadataWriter) return;
    this.metadataQueue.push(record);
  }

  /**
   * Opens an event recording, or pushes the end of the running one further
   * out. `timestampUs` is the raw pipeline time of the detection; without it
   * the last delivered frame's time is used.
   */
  notifyEvent(sequenceId: number, timestampUs?: number): void {
    // While stopped the output clock is frozen at the last forwarded frame
    const nowUs =
      this.state === OutputState.RUNNING
        ? (timestampUs ?? this.lastRawTimestampUs ?? this.timeOffsetUs) - this.timeOffsetUs
        : this.lastTimestampUs;
    const endUs = nowUs + Math.round(this.settings.detectionRecordSecs * 1_000_000);

    if (this.session) {
      if (endUs > this.session.endUs) {
        console.log(`[Output] Extending event recording due to detection #${sequenceId}`);
        this.session.endUs = endUs;
      }
      return;
    }

    const handle = this.eventSink.open({
      role: SinkRole.SECONDARY,
      timestampUs: nowUs,
      wallClock: this.now(),
    });

    this.session = {
      sequenceId,
      cutoffRawUs: timestampUs ?? null,
      startUs: nowUs,
      endUs,
      handle,
      pendingFlush: true,
      firstFramePending: true,
    };
    this.pendingNotification = sequenceId;
    console.log(`[Output] Started event recording #${sequenceId} at ${handle.path ?? "<no path>"}`);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    try {
      this.stopEventSession();
      this.closePrimary();
    } finally {
      this.timestampWriter?.close();
      this.metadataWriter?.stop();
      this.transcoder?.cancelAll();
    }
  }

  getStatus(): OutputStatus {
    return {
      state: this.state,
      enabled: this.enabled,
      timeOffsetUs: this.timeOffsetUs,
      lastTimestampUs: this.lastTimestampUs,
      preBuffer: { size: this.preBuffer.size, capacity: this.preBuffer.capacity },
      session: this.session && {
        sequenceId: this.session.sequenceId,
        startUs: this.session.startUs,
        endUs: this.session.endUs,
        artifactPath: this.session.handle.path,
      },
    };
  }

  /* -------------------------------------------------------------------------- */
  /*                               Primary output                               */
  /* -------------------------------------------------------------------------- */
  private forward(frame: Frame): void {
    let flags: number = keyframeFlag(frame.keyframe);

    if (!this.enabled) this.state = OutputState.DISABLED;
    else if (this.state === OutputState.DISABLED) this.state = OutputState.WAITING_KEYFRAME;
    if (this.state === OutputState.WAITING_KEYFRAME && frame.keyframe) {
      this.state = OutputState.RUNNING;
      flags |= OutputFlag.RESTART;
    }
    if (this.state !== OutputState.RUNNING) return;

    // Keep the output timeline continuous across a pause
    if (flags & OutputFlag.RESTART) {
      this.timeOffsetUs = frame.timestampUs - this.lastTimestampUs;
    }
    this.lastTimestampUs = frame.timestampUs - this.timeOffsetUs;
    const timestampUs = this.lastTimestampUs;

    this.writePrimary(frame.data, timestampUs, flags);
    this.timestampWriter?.write(timestampUs);
    this.writeMetadata();
    this.dispatchNotification(frame);

    if (this.session) {
      this.recordEvent(this.session, frame, timestampUs);
    }
  }

  private writePrimary(data: Uint8Array, timestampUs: number, flags: number): void {
    let handle = this.primaryHandle;
    if (!handle || this.isRotationDue(timestampUs, flags)) {
      handle = this.openPrimary(timestampUs);
    }

    try {
      this.primarySink.write(handle, data, timestampUs, flags);
    } catch (err) {
      // Forget the broken destination; the next forwarded frame opens a new one
      this.primaryHandle = null;
      this.closeQuietly(this.primarySink, handle);
      throw err;
    }
  }

  private isRotationDue(timestampUs: number, flags: number): boolean {
    const { segmentMs, split } = this.settings;

    if (segmentMs > 0 && flags & OutputFlag.KEYFRAME) {
      if (Math.trunc(timestampUs / 1000) - this.segmentStartMs > segmentMs) return true;
    }
    return split && (flags & OutputFlag.RESTART) !== 0;
  }

  private openPrimary(timestampUs: number): SinkHandle {
    this.closePrimary();

    const handle = this.primarySink.open({
      role: SinkRole.PRIMARY,
      timestampUs,
      wallClock: this.now(),
    });
    this.primaryHandle = handle;
    this.segmentStartMs = Math.trunc(timestampUs / 1000);
    return handle;
  }

  private closePrimary(): void {
    const handle = this.primaryHandle;
    this.primaryHandle = null;
    if (handle) this.primarySink.close(handle);
  }

  private writeMetadata(): void {
    if (!this.metadataWriter) return;

    const record = this.metadataQueue.shift();
    if (!record) {
      throw new ContractViolationError("No metadata queued for a forwarded frame");
    }
    this.metadataWriter.write(record);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Event recording                              */
  /* -------------------------------------------------------------------------- */
  private dispatchNotification(frame: Frame): void {
    const sequenceId = this.pendingNotification;
    if (sequenceId === null) return;
    this.pendingNotification = null;

    if (!this.notifier) return;

    console.log(`[Output] Sending notification for detection #${sequenceId}`);
    this.notifier
      .send(Buffer.from(frame.data), frame.timestampUs)
      .then(() => console.log(`[Output] Notification for detection #${sequenceId} delivered`))
      .catch((err: unknown) => {
        console.error(
          `[Output] Notification for detection #${sequenceId} failed:`,
          err instanceof Error ? err.message : err,
        );
      });
  }

  /** Runs on every delivered frame, whatever the primary state. */
  private flushPreEvent(frame: Frame): void {
    const session = this.session;
    if (!session?.pendingFlush) return;
    session.pendingFlush = false;

    const backlog = this.preBuffer.drainBefore(session.cutoffRawUs ?? frame.timestampUs);
    try {
      for (const buffered of backlog) {
        this.eventSink.write(
          session.handle,
          buffered.data,
          buffered.timestampUs - this.timeOffsetUs,
          keyframeFlag(buffered.keyframe),
        );
      }
    } catch (err) {
      console.error(`[Output] Event recording #${session.sequenceId} failed, closing it`);
      this.stopEventSession();
      throw err;
    }
    console.log(`[Output] Flushed ${backlog.length} pre-event frames to ${session.handle.path ?? "<no path>"}`);
  }

  private recordEvent(session: EventSession, frame: Frame, timestampUs: number): void {
    try {
      this.eventSink.write(session.handle, frame.data, timestampUs, keyframeFlag(frame.keyframe));
    } catch (err) {
      console.error(`[Output] Event recording #${session.sequenceId} failed, closing it`);
      this.stopEventSession();
      throw err;
    }

    if (session.firstFramePending) {
      session.firstFramePending = false;
      this.captureThumbnail(session, frame, timestampUs);
    }

    if (timestampUs > session.endUs) {
      console.log(`[Output] Event recording #${session.sequenceId} window has ended`);
      this.stopEventSession();
    }
  }

  private captureThumbnail(session: EventSession, frame: Frame, timestampUs: number): void {
    let handle: SinkHandle | null = null;

    try {
      handle = this.eventSink.open({
        role: SinkRole.THUMBNAIL,
        timestampUs,
        wallClock: this.now(),
        relatedPath: session.handle.path ?? undefined,
      });
      this.eventSink.write(handle, frame.data, timestampUs, keyframeFlag(frame.keyframe));
      console.log(`[Output] Thumbnail written to ${handle.path ?? "<no path>"}`);
    } catch (err) {
      console.error(`[Output] Thumbnail for event recording #${session.sequenceId} failed:`, err);
    } finally {
      if (handle) this.closeQuietly(this.eventSink, handle);
    }
  }

  private stopEventSession(): void {
    const session = this.session;
    if (!session) return;
    this.session = null;

    console.log(
      `[Output] Stopping event recording #${session.sequenceId}, start: ${session.startUs} end: ${session.endUs}`,
    );
    this.closeQuietly(this.eventSink, session.handle);

    const artifact = session.handle.path;
    if (artifact && this.transcoder) {
      this.transcoder.submit(artifact);
    }
  }

  private closeQuietly(sink: Sink, handle: SinkHandle): void {
    try {
      sink.close(handle);
    } catch (err) {
      console.error(`[Output] Failed to close ${handle.path ?? sink.kind}:`, err);
    }
  }
}

export interface OutputCollaborators {
  notifier?: Notifier | null;
  transcoder?: TranscodeHandoff | null;
}

/** Builds a controller with the sinks and writers the options ask for. */
export function createOutputController(
  options: OutputOptions,
  collaborators: OutputCollaborators = {},
): OutputController {
  const primarySink = createPrimarySink(options);
  const eventSink = createEventSink(options.detectionRecordPath);
  const timestampWriter = options.savePts ? new PtsFileWriter(options.savePts) : null;
  const metadataWriter = options.metadata
    ? createMetadataWriter(options.metadataFormat, options.metadata)
    : null;

  return new OutputController(options, {
    primarySink,
    eventSink,
    timestampWriter,
    metadataWriter,
    ...collaborators,
  });
}
