import type { Request, Response } from "express";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ContractViolationError, NotFoundErrorResponse, OutputWriteError } from "@/core/error.core.js";
import { catchError, toErrorStatus } from "@/middlewares/handleError.middleware.js";

describe("error handling", () => {
  it("maps errors to status codes", () => {
    expect(toErrorStatus(new NotFoundErrorResponse({ message: "No such recording" }))).toEqual({
      code: 404,
      message: "No such recording",
    });
    expect(toErrorStatus(new ContractViolationError("out of order"))).toEqual({ code: 409, message: "out of order" });
    expect(toErrorStatus(new OutputWriteError("/rec/a.mjpeg"))).toEqual({
      code: 500,
      message: "Failed to write output bytes to /rec/a.mjpeg",
    });
    expect(toErrorStatus(new Error("secret detail"))).toEqual({ code: 500, message: "Internal server error" });
  });

  it("reports validation issues as bad requests", () => {
    const result = z.object({ enabled: z.boolean() }).safeParse({});
    if (result.success) throw new Error("expected a validation failure");

    expect(toErrorStatus(result.error)).toEqual({ code: 400, message: "enabled: Required" });
  });

  it("forwards handler rejections to next", async () => {
    const error = new NotFoundErrorResponse();
    const next = vi.fn<(err?: unknown) => void>();
    const handler = catchError(async () => {
      throw error;
    });

    handler({} as Request, {} as Response, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalledWith(error));
  });
});
