import express from "express";
import type multer from "multer";
import { handleErrors } from "./api/middlewares/error.middleware";
import { buildProfileRouter } from "./api/routes/profile.routes";
import { buildTailorRouter } from "./api/routes/tailor.routes";
import type { ProfileBuilderService } from "./services/profile-builder.services";
import type { TailoringService } from "./services/tailoring.services";
import type { ProfileStore } from "./store/profile-store";

export interface AppDependencies {
  store: ProfileStore;
  profileBuilder: ProfileBuilderService;
  tailoringService: TailoringService;
  extractText: (filePath: string) => Promise<string>;
  upload: multer.Multer;
}

export function buildApp(deps: AppDependencies) {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (req, res) => {
    res.json({ status: "ok" });
  });

  app.use(buildProfileRouter(deps));
  app.use(buildTailorRouter(deps));

  app.use((req, res) => {
    res.status(404).json({ error: `Cannot ${req.method} ${req.path}` });
  });
  app.use(handleErrors);

  return app;
}
