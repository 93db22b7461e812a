import express, { type NextFunction, type Request, type Response } from "express";
import { tailorRequestSchema } from "../../schemas/profile-schemas";
import type { TailoringService } from "../../services/tailoring.services";
import { ValidationError } from "../../utils/errors";

export interface TailorRouteDependencies {
  tailoringService: TailoringService;
}

export function buildTailorRouter(deps: TailorRouteDependencies) {
  const router = express.Router();

  /**
   * POST /tailor
   * Tailors the stored profile to `job_offer` and answers with the PDF.
   */
  router.post("/tailor", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = tailorRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
      }

      const result = await deps.tailoringService.tailor(parsed.data.job_offer, {
        skillsFormat: parsed.data.skills_format,
      });

      res
        .status(200)
        .set({
          "Content-Type": "application/pdf",
          "Content-Disposition": `attachment; filename="${encodeURIComponent(result.filename)}"`,
          "X-Job-Title": encodeURIComponent(result.jobTitle ?? ""),
          "X-Resume-Locale": result.locale,
        })
        .send(result.pdf);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
