import type { Response } from "express";
import { CancelledError } from "@stratarag/errors";

/** Aborts when the client disconnects before the response has been sent. */
export function responseSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new CancelledError("Client disconnected"));
    }
  });
  return controller.signal;
}
