import type { NextFunction, Request, Response } from "express";

/**
 * Middleware to validate presence of the resume PDF in the upload request.
 */
export const validateResumeFile = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (!req.file) {
    res.status(400).json({
      error: "A PDF file is required in the 'resume' field.",
    });
    return;
  }

  next();
};
