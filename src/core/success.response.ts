import type { Response } from "express";

export class SuccessResponse<T> {
  private readonly code: number;
  private readonly message: string;
  private readonly metadata: T;

  constructor({ code = 200, message, metadata }: { code?: number; message: string; metadata: T }) {
    this.code = code;
    this.message = message;
    this.metadata = metadata;
  }

  send(res: Response) {
    return res.status(this.code).json({
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    });
  }
}

export class OkResponse<T> extends SuccessResponse<T> {
  constructor({ message, metadata }: { message: string; metadata: T }) {
    super({ code: 200, message, metadata });
  }
}
