import "dotenv/config";
import fs from "fs-extra";
import { parseArgs } from "util";
import { createServices } from "./bootstrap";
import { AppError } from "./utils/errors";
import logger, { describeError } from "./utils/logger";

const USAGE = [
  "Usage:",
  "  npm run profile:prepare -- <resume.pdf>   build and store the profile from a resume",
  "  npm run resume:tailor -- <offer.txt> [--structured-skills]",
  "                                            generate a resume tailored to a job offer",
].join("\n");

async function prepare(pdfPath: string): Promise<void> {
  const { profileBuilder, store, extractText } = createServices();

  const text = await extractText(pdfPath);
  if (!text.trim()) {
    throw new AppError(
      "No text could be extracted from the PDF. Create the profile manually with POST /profile.",
      422,
    );
  }

  const profile = await profileBuilder.buildFromText(text);
  await store.save(profile);
  logger.info("Profile saved", {
    path: store.path,
    name: profile.identity.name,
    experiences: profile.experiences.length,
  });
}

async function tailor(offerPath: string, structuredSkills: boolean): Promise<void> {
  const { tailoringService } = createServices();

  const offer = await fs.readFile(offerPath, "utf8");
  const result = await tailoringService.tailor(offer, {
    skillsFormat: structuredSkills ? "structured" : "markup",
  });
  logger.info("Resume written", { filePath: result.filePath, jobTitle: result.jobTitle });
}

async function main(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "structured-skills": { type: "boolean", default: false },
    },
  });
  const [command, file] = positionals;

  if (!file || (command !== "prepare" && command !== "tailor")) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (command === "prepare") {
    await prepare(file);
  } else {
    await tailor(file, values["structured-skills"] === true);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof AppError) {
    logger.error(error.message);
  } else {
    logger.error("Command failed", { error: describeError(error) });
  }
  process.exitCode = 1;
});
