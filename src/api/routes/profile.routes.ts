import express, { type NextFunction, type Request, type Response } from "express";
import type multer from "multer";
import fs from "fs-extra";
import { adaptationNoteSchema } from "../../schemas/profile-schemas";
import type { ProfileBuilderService } from "../../services/profile-builder.services";
import type { ProfileStore } from "../../store/profile-store";
import { AppError, ValidationError } from "../../utils/errors";
import logger, { describeError } from "../../utils/logger";
import { validateResumeFile } from "../middlewares/upload.middleware";

export interface ProfileRouteDependencies {
  store: ProfileStore;
  profileBuilder: ProfileBuilderService;
  extractText: (filePath: string) => Promise<string>;
  upload: multer.Multer;
}

async function discardUpload(filePath: string): Promise<void> {
  try {
    await fs.remove(filePath);
  } catch (error) {
    logger.warn("Failed to remove uploaded file", { filePath, error: describeError(error) });
  }
}

export function buildProfileRouter(deps: ProfileRouteDependencies) {
  const router = express.Router();

  /**
   * GET /profile
   * Returns the stored canonical profile, migrating it first if needed.
   */
  router.get("/profile", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.store.load());
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /profile
   * Builds a profile from a manual entry and stores it.
   */
  router.post("/profile", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = await deps.profileBuilder.buildFromManualEntry(req.body ?? {});
      await deps.store.save(profile);
      logger.info("Profile created from manual entry", { name: profile.identity.name });
      res.status(201).json(profile);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /profile/upload
   * Extracts the text of a resume PDF ('resume' field), structures it and stores it.
   */
  router.post(
    "/profile/upload",
    deps.upload.single("resume"),
    validateResumeFile,
    async (req: Request, res: Response, next: NextFunction) => {
      const filePath = req.file?.path;
      if (!filePath) {
        next(new ValidationError("A PDF file is required in the 'resume' field."));
        return;
      }

      try {
        let text: string;
        try {
          text = await deps.extractText(filePath);
        } finally {
          await discardUpload(filePath);
        }

        if (!text.trim()) {
          next(
            new AppError(
              "No text could be extracted from the PDF. Submit the profile manually with POST /profile.",
              422,
            ),
          );
          return;
        }

        const profile = await deps.profileBuilder.buildFromText(text);
        await deps.store.save(profile);
        logger.info("Profile created from PDF", {
          name: profile.identity.name,
          experiences: profile.experiences.length,
        });
        res.status(201).json(profile);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /profile/notes
   * Records an adaptation note for a job title and returns the whole ledger.
   */
  router.post("/profile/notes", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = adaptationNoteSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
      }

      const memoryNotes = await deps.store.recordAdaptationNote(
        parsed.data.job_title,
        parsed.data.note,
      );
      res.json({ memory_notes: memoryNotes });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
