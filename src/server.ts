import "dotenv/config";
import { buildApp } from "./app";
import { createServices } from "./bootstrap";
import { PORT } from "./utils/constants";
import logger, { describeError } from "./utils/logger";

try {
  const app = buildApp(createServices());

  app.listen(PORT, () => {
    logger.info(`Server started successfully`, { port: PORT });
  });
} catch (error) {
  logger.error("Failed to start server", { error: describeError(error) });
  process.exitCode = 1;
}
