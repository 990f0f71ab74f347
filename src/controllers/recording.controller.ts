import type { RequestHandler } from "express";
import { z } from "zod";
import { OkResponse } from "@/core/success.response.js";
import type { RecordingService } from "@/services/recording.service.js";

const listQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
});

export default class RecordingController {
    constructor(private readonly recordings: RecordingService) {}

    getRecordings: RequestHandler = async (req, res) => {
        const { limit } = listQuerySchema.parse(req.query);

        new OkResponse({
            message: "Get recordings successfully",
            metadata: await this.recordings.list(limit),
        }).send(res);
    };
}
