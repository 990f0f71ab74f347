import type { RequestHandler } from "express";
import { OkResponse } from "@/core/success.response.js";
import { detectionSchema, enabledSchema } from "@/schemas/output.schema.js";
import type { OutputController } from "@/services/output.service.js";

export default class OutputApiController {
    constructor(private readonly output: OutputController) {}

    getStatus: RequestHandler = (req, res) => {
        new OkResponse({
            message: "Get output status successfully",
            metadata: this.output.getStatus(),
        }).send(res);
    };

    toggle: RequestHandler = (req, res) => {
        const enabled = this.output.toggle();

        new OkResponse({
            message: enabled ? "Output resumed" : "Output paused",
            metadata: { enabled },
        }).send(res);
    };

    setEnabled: RequestHandler = (req, res) => {
        const { enabled } = enabledSchema.parse(req.body);
        this.output.setEnabled(enabled);

        new OkResponse({
            message: "Output state updated successfully",
            metadata: { enabled: this.output.isEnabled() },
        }).send(res);
    };

    notifyDetection: RequestHandler = (req, res) => {
        const { sequence_id, timestamp_us } = detectionSchema.parse(req.body);
        this.output.notifyEvent(sequence_id, timestamp_us);

        new OkResponse({
            message: "Detection accepted",
            metadata: this.output.getStatus().session,
        }).send(res);
    };
}
