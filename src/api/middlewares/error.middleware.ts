import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError } from "../../utils/errors";
import logger, { describeError } from "../../utils/logger";

/**
 * Serializes errors as `{ error: message }` with the status their class
 * carries. Multer errors become 400 responses; anything else is a 500.
 */
export const handleErrors = (
  error: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument functions as error handlers
  _next: NextFunction,
) => {
  if (error instanceof multer.MulterError) {
    switch (error.code) {
      case "LIMIT_FILE_SIZE":
        res.status(400).json({
          error: "File size too large. Maximum allowed size is 10MB.",
        });
        return;
      case "LIMIT_UNEXPECTED_FILE":
        res.status(400).json({
          error: "Unexpected file field. Only 'resume' is allowed.",
        });
        return;
      default:
        res.status(400).json({ error: error.message });
        return;
    }
  }

  if (error instanceof SyntaxError && "body" in error) {
    res.status(400).json({ error: "Request body is not valid JSON" });
    return;
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error("Request failed", { path: req.path, error: error.message });
    }
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  logger.error("Unhandled error", { path: req.path, error: describeError(error) });
  res.status(500).json({ error: "Internal server error" });
};
