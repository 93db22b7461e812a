import fs from "fs-extra";
import path from "path";
import type { Locale } from "../schemas/profile-schemas";
import type { ProfileStore } from "../store/profile-store";
import { ValidationError } from "../utils/errors";
import logger, { describeError } from "../utils/logger";
import {
  detectLanguage,
  stripUnsafeFilenameChars,
  type JobAdapterService,
  type SkillsView,
} from "./job-adapter.services";
import type { DocumentRenderer } from "./renderer.services";

export type TailoringStage =
  | "extracting_title"
  | "adapting_summary"
  | "selecting_experiences"
  | "selecting_skills"
  | "rendering";

export type SkillsFormat = "markup" | "structured";

export interface TailoringOptions {
  skillsFormat?: SkillsFormat;
}

export interface TailoringResult {
  jobTitle: string | null;
  locale: Locale;
  filename: string;
  filePath: string;
  pdf: Buffer;
  stages: TailoringStage[];
}

function formatDateStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}${month}${day}`;
}

/**
 * `Resume_<title>.pdf`, or `Resume_<Candidate_Name>_<YYYYMMDD>.pdf` when the
 * offer yielded no title.
 */
export function buildResumeFilename(
  jobTitle: string | null,
  candidateName: string,
  date: Date,
): string {
  const base = jobTitle
    ? `Resume_${jobTitle}`
    : `Resume_${candidateName.replace(/ /g, "_")}_${formatDateStamp(date)}`;
  return `${stripUnsafeFilenameChars(base)}.pdf`;
}

export function adaptationNote(jobTitle: string): string {
  return `Generated resume tailored for: ${jobTitle}`;
}

/**
 * Runs one tailoring pass: title, summary, experiences, skills, then the PDF.
 * Only a missing profile or a rendering failure aborts the run.
 */
export class TailoringService {
  constructor(
    private readonly store: ProfileStore,
    private readonly adapter: JobAdapterService,
    private readonly renderer: DocumentRenderer,
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Tailors the stored profile to the offer and writes the PDF to the output directory.
   *
   * @param jobOffer - Full text of the job offer.
   * @param options - `skillsFormat` picks the markup or JSON skill selection.
   * @returns The rendered PDF with its file name and the stages visited.
   * @throws ValidationError if the offer is empty.
   * @throws ProfileNotFoundError if no profile has been created yet.
   */
  async tailor(
    jobOffer: string,
    options: TailoringOptions = {},
  ): Promise<TailoringResult> {
    if (!jobOffer.trim()) {
      throw new ValidationError("The job offer is empty");
    }

    const profile = await this.store.load();
    const locale = detectLanguage(jobOffer);
    const stages: TailoringStage[] = [];

    stages.push("extracting_title");
    const jobTitle = await this.adapter.extractJobTitle(jobOffer, locale);
    logger.info("Tailoring resume", { jobTitle, locale });

    stages.push("adapting_summary");
    const summary = await this.adapter.adaptSummary(profile, jobOffer, locale);

    stages.push("selecting_experiences");
    const experiences = await this.adapter.selectExperiences(profile, jobOffer, locale);

    stages.push("selecting_skills");
    const skills: SkillsView =
      options.skillsFormat === "structured"
        ? {
            kind: "structured",
            skills: await this.adapter.selectSkills(profile, jobOffer, locale),
          }
        : await this.adapter.selectSkillsMarkup(profile, jobOffer, locale);

    if (jobTitle) {
      await this.recordNote(jobTitle);
    }

    const filename = buildResumeFilename(jobTitle, profile.identity.name, this.now());

    stages.push("rendering");
    const pdf = await this.renderer.render({ profile, summary, experiences, skills, locale });

    const filePath = path.join(this.outputDir, filename);
    await fs.outputFile(filePath, pdf);
    logger.info("Resume generated", { filePath, size: pdf.length });

    return { jobTitle, locale, filename, filePath, pdf, stages };
  }

  /**
   * Helper method to record the adaptation note without failing the run.
   */
  private async recordNote(jobTitle: string): Promise<void> {
    try {
      await this.store.recordAdaptationNote(jobTitle, adaptationNote(jobTitle));
    } catch (error) {
      logger.error("Failed to record adaptation note", {
        jobTitle,
        error: describeError(error),
      });
    }
  }
}
