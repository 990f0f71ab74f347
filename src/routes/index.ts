import type { Application } from "express";
import createApiRouter, { type ApiServices } from "@/routes/api.route.js";

export default function handleRoute(app: Application, services: ApiServices) {
    app.use("/api", createApiRouter(services));
}
