import type { AppDependencies } from "./app";
import { createCompletionService } from "./services/llm.services";
import { JobAdapterService } from "./services/job-adapter.services";
import { ProfileBuilderService } from "./services/profile-builder.services";
import { PdfResumeRenderer } from "./services/renderer.services";
import { TailoringService } from "./services/tailoring.services";
import { ProfileStore } from "./store/profile-store";
import { OUTPUT_DIR, PROFILE_PATH, UPLOAD_DIR } from "./utils/constants";
import { createUpload } from "./utils/multer";
import { extractTextFromPDF } from "./utils/pdf-extraction";
import logger from "./utils/logger";

/**
 * Wires the services from the environment configuration.
 *
 * @throws ConfigurationError for an unknown backend or a missing API key.
 */
export function createServices(): AppDependencies {
  const completion = createCompletionService();
  const store = new ProfileStore(PROFILE_PATH);
  const adapter = new JobAdapterService(completion);

  logger.info("Services initialized", {
    backend: completion.name,
    profilePath: PROFILE_PATH,
    outputDir: OUTPUT_DIR,
  });

  return {
    store,
    profileBuilder: new ProfileBuilderService(completion),
    tailoringService: new TailoringService(store, adapter, new PdfResumeRenderer(), OUTPUT_DIR),
    extractText: (filePath) => extractTextFromPDF(filePath),
    upload: createUpload(UPLOAD_DIR),
  };
}
