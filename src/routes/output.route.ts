import { Router } from "express";
import OutputApiController from "@/controllers/output.controller.js";
import { catchError } from "@/middlewares/handleError.middleware.js";
import type { OutputController } from "@/services/output.service.js";

export default function createOutputRouter(output: OutputController): Router {
    const router = Router();
    const controller = new OutputApiController(output);

    router.get("/status", catchError(controller.getStatus));
    router.post("/toggle", catchError(controller.toggle));
    router.put("/enabled", catchError(controller.setEnabled));
    router.post("/detection", catchError(controller.notifyDetection));

    return router;
}
