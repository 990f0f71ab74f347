import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { ContractViolationError, ErrorResponse, OutputError } from "@/core/error.core.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown;

export function catchError(handler: AsyncHandler): RequestHandler {
    return (req, res, next) => {
        Promise.resolve()
            .then(() => handler(req, res, next))
            .catch(next);
    };
}

export function toErrorStatus(err: unknown): { code: number; message: string } {
    if (err instanceof ErrorResponse) {
        return { code: err.code, message: err.message };
    }
    if (err instanceof ZodError) {
        const message = err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
        return { code: 400, message };
    }
    if (err instanceof ContractViolationError) {
        return { code: 409, message: err.message };
    }
    if (err instanceof OutputError) {
        return { code: 500, message: err.message };
    }
    return { code: 500, message: "Internal server error" };
}

export const handleError: ErrorRequestHandler = (err: unknown, req, res, next) => {
    const { code, message } = toErrorStatus(err);

    if (code >= 500) {
        console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, err);
    }

    if (res.headersSent) {
        return next(err);
    }

    res.status(code).json({ code, message });
};
