import type { Frame } from "@/types/output.js";

/** int64 BE raw timestamp (µs) + uint8 flags. */
export const FRAME_HEADER_SIZE = 9;
const KEYFRAME_BIT = 0x01;

export function encodeFrameMessage(frame: Frame): Buffer {
  const message = Buffer.alloc(FRAME_HEADER_SIZE + frame.data.byteLength);
  message.writeBigInt64BE(BigInt(frame.timestampUs), 0);
  message.writeUInt8(frame.keyframe ? KEYFRAME_BIT : 0, 8);
  message.set(frame.data, FRAME_HEADER_SIZE);
  return message;
}

export function decodeFrameMessage(message: Buffer): Frame {
  if (message.byteLength < FRAME_HEADER_SIZE) {
    throw new RangeError(`Frame message too short: ${message.byteLength} bytes`);
  }

  const timestamp = message.readBigInt64BE(0);
  if (timestamp > BigInt(Number.MAX_SAFE_INTEGER) || timestamp < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new RangeError(`Frame timestamp out of range: ${timestamp}`);
  }

  return {
    data: message.subarray(FRAME_HEADER_SIZE),
    timestampUs: Number(timestamp),
    keyframe: (message.readUInt8(8) & KEYFRAME_BIT) !== 0,
  };
}
