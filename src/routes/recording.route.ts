import { Router } from "express";
import RecordingController from "@/controllers/recording.controller.js";
import { catchError } from "@/middlewares/handleError.middleware.js";
import type { RecordingService } from "@/services/recording.service.js";

export default function createRecordingRouter(recordings: RecordingService): Router {
    const router = Router();
    const controller = new RecordingController(recordings);

    router.get("/", catchError(controller.getRecordings));

    return router;
}
