import type { IncomingMessage } from "http";
import type { RawData, WebSocket, WebSocketServer } from "ws";
import { metadataRecordSchema } from "@/schemas/output.schema.js";
import type { OutputController } from "@/services/output.service.js";
import { decodeFrameMessage } from "@/utils/frameHeader.util.js";

export function toBuffer(data: RawData): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (Array.isArray(data)) return Buffer.concat(data);
    return Buffer.from(data);
}

/**
 * Camera WebSocket Service
 * Path: /ws/camera
 *
 * - Binary message: timestamped frame, fed to the output controller
 * - Text message: JSON metadata record for the next forwarded frame
 */
export function handleCameraMessage(output: OutputController, data: RawData, isBinary: boolean): void {
    const buffer = toBuffer(data);

    if (isBinary) {
        output.deliver(decodeFrameMessage(buffer));
        return;
    }

    const record = metadataRecordSchema.parse(JSON.parse(buffer.toString("utf8")));
    output.attachMetadata(record);
}

export default function runCameraWsService(wss: WebSocketServer, output: OutputController) {
    console.log("[CameraWS] Service initialized on path /ws/camera");

    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
        const remote = req.socket.remoteAddress ?? "unknown";
        console.log(`[CameraWS] Client connected: ${remote}`);

        ws.on("message", (data: RawData, isBinary: boolean) => {
            try {
                handleCameraMessage(output, data, isBinary);
            } catch (err) {
                console.error(`[CameraWS][ERROR] Failed to handle message from ${remote}:`, err);
            }
        });

        ws.on("error", (err) => {
            console.error(`[CameraWS][ERROR] WebSocket error for ${remote}:`, err);
        });

        ws.on("close", () => {
            console.log(`[CameraWS] Client disconnected: ${remote}`);
        });
    });

    wss.on("error", (err) => {
        console.error("[CameraWS][ERROR] WebSocket server error:", err);
    });
}
