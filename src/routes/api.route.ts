import { Router } from "express";
import createOutputRouter from "@/routes/output.route.js";
import createRecordingRouter from "@/routes/recording.route.js";
import type { OutputController } from "@/services/output.service.js";
import type { RecordingService } from "@/services/recording.service.js";

export interface ApiServices {
    output: OutputController;
    recordings: RecordingService;
}

export default function createApiRouter({ output, recordings }: ApiServices): Router {
    const router = Router();

    router.use("/output", createOutputRouter(output));
    router.use("/recordings", createRecordingRouter(recordings));

    return router;
}
