import { Schema, model, type InferSchemaType } from "mongoose";
import { RecordingStatus } from "@/enums/output.enum.js";

export const RECORDING_MODEL_NAME = "Recording";
export const RECORDING_COLLECTION_NAME = "recordings";

export const recordingSchema = new Schema({
    raw_path: { type: String, required: true },
    output_path: { type: String, required: true },
    thumbnail_path: { type: String, required: true },
    status: {
        type: String,
        required: true,
        enum: Object.values(RecordingStatus),
    },
    error: { type: String, default: null },
    created_at: { type: Date, default: Date.now },
}, {
    collection: RECORDING_COLLECTION_NAME,
});

recordingSchema.index({ created_at: -1 });

export type RecordingDocument = InferSchemaType<typeof recordingSchema>;

export default model(RECORDING_MODEL_NAME, recordingSchema);
