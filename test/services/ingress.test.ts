import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { handleCameraMessage, toBuffer } from "@/services/cameraWs.service.js";
import { handleDetectionMessage } from "@/services/mqtt.service.js";
import { OutputController } from "@/services/output.service.js";
import { encodeFrameMessage } from "@/utils/frameHeader.util.js";
import { FakeSink } from "../helpers/fakeSink.js";

function createController() {
  return new OutputController(
    { segmentMs: 0, split: false, pause: false, framerate: 30, preDetectionSecs: 0, detectionRecordSecs: 5 },
    { primarySink: new FakeSink(), eventSink: new FakeSink() },
  );
}

describe("camera and detection ingress", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers binary camera messages as frames", () => {
    const controller = createController();
    const deliver = vi.spyOn(controller, "deliver");

    handleCameraMessage(controller, encodeFrameMessage({ data: Uint8Array.of(5), timestampUs: 1_000, keyframe: true }), true);

    expect(deliver).toHaveBeenCalledWith({ data: Buffer.of(5), timestampUs: 1_000, keyframe: true });
    expect(controller.getStatus().lastTimestampUs).toBe(0);
  });

  it("queues text camera messages as metadata", () => {
    const controller = createController();
    const attach = vi.spyOn(controller, "attachMetadata");

    handleCameraMessage(controller, Buffer.from('{"seq":1,"labels":["car"]}'), false);

    expect(attach).toHaveBeenCalledWith({ seq: 1, labels: ["car"] });
    expect(() => handleCameraMessage(controller, Buffer.from('{"nested":{"a":1}}'), false)).toThrow(ZodError);
  });

  it("joins fragmented messages", () => {
    expect(toBuffer([Buffer.of(1), Buffer.of(2, 3)])).toEqual(Buffer.of(1, 2, 3));
  });

  it("turns detection messages into events", () => {
    const controller = createController();
    const notify = vi.spyOn(controller, "notifyEvent");

    handleDetectionMessage(controller, Buffer.from('{"sequence_id":3,"timestamp_us":2000}'));

    expect(notify).toHaveBeenCalledWith(3, 2_000);
    expect(controller.getStatus().session).toEqual({
      sequenceId: 3,
      startUs: 0,
      endUs: 5_000_000,
      artifactPath: "secondary-0",
    });
    expect(() => handleDetectionMessage(controller, Buffer.from('{"sequence_id":-1}'))).toThrow(ZodError);
  });
});
