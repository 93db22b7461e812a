import { z } from "zod";
import { buildPrompt, PROMPT_LOCALES, TAILORING_PROMPTS } from "../prompts";
import {
  draftExperienceSchema,
  type CanonicalProfile,
  type Experience,
  type Locale,
  type ProfileSkills,
} from "../schemas/profile-schemas";
import {
  FALLBACK_EXPERIENCE_COUNT,
  MAX_JOB_TITLE_LENGTH,
  MAX_OFFER_CHARS_FOR_TITLE,
} from "../utils/constants";
import { extractJsonArray, extractJsonObject } from "../utils/json-extraction";
import logger, { describeError } from "../utils/logger";
import type { CompletionService } from "./llm.services";

export interface SkillLine {
  label: string;
  items: string[];
}

export type SkillsView =
  | { kind: "markup"; lines: SkillLine[] }
  | { kind: "structured"; skills: ProfileSkills };

const LANGUAGE_HINTS: Record<Locale, readonly string[]> = {
  en: ["the", "and", "with", "we", "you", "our", "for", "experience", "skills"],
  fr: [
    "le", "les", "des", "et", "pour", "nous", "vous", "avec", "une", "du",
    "expérience", "compétences", "langues", "poste",
  ],
  es: [
    "el", "los", "las", "y", "para", "con", "una", "del", "buscamos",
    "experiencia", "habilidades", "idiomas", "puesto",
  ],
};

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const SKILL_LINE_PATTERN = /^<b>\s*([^<]+?)\s*:?\s*<\/b>\s*:?\s*(.*)$/i;

const tailoredExperiencesSchema = z.array(draftExperienceSchema);

const tailoredSkillsSchema = z.object({
  technical: z.array(z.string()),
  soft: z.array(z.string()).optional(),
  methodological: z.array(z.string()).optional(),
});

/**
 * Guesses the language of a job offer from common function words.
 * Ties and offers without any hint resolve to English.
 */
export function detectLanguage(text: string): Locale {
  const words = new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
  const score = (locale: Locale) =>
    LANGUAGE_HINTS[locale].filter((hint) => words.has(hint)).length;

  let best: Locale = "en";
  let bestScore = score("en");
  for (const locale of ["fr", "es"] as const) {
    const current = score(locale);
    if (current > bestScore) {
      best = locale;
      bestScore = current;
    }
  }
  return best;
}

/**
 * Removes the characters that cannot appear in a file name.
 */
export function stripUnsafeFilenameChars(value: string): string {
  return value.replace(UNSAFE_FILENAME_CHARS, "");
}

/**
 * Parses `<b>Label:</b> a, b, c` lines separated by `<br/>` or newlines.
 * Returns null unless exactly two labeled lines with items are found.
 */
export function parseSkillMarkup(text: string): SkillLine[] | null {
  const lines: SkillLine[] = [];
  for (const rawLine of text.split(/<br\s*\/?>|\r?\n/i)) {
    const match = rawLine.trim().match(SKILL_LINE_PATTERN);
    if (!match) continue;

    const label = match[1].replace(/:$/, "").trim();
    const items = match[2]
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
    if (!label || items.length === 0) return null;
    lines.push({ label, items });
  }
  return lines.length === 2 ? lines : null;
}

/**
 * Tailors pieces of a stored profile to one job offer. Every operation falls
 * back to a deterministic answer built from the stored profile when the
 * completion fails or its output cannot be parsed.
 */
export class JobAdapterService {
  constructor(private readonly completion: CompletionService) {}

  /**
   * Asks for the job title of the offer and makes it safe to use in a file name.
   *
   * @returns The title, or null when none could be extracted.
   */
  async extractJobTitle(
    jobOffer: string,
    locale: Locale = detectLanguage(jobOffer),
  ): Promise<string | null> {
    const prompt = buildPrompt(TAILORING_PROMPTS.EXTRACT_TITLE, {
      titleInstruction: PROMPT_LOCALES[locale].titleInstruction,
      jobOffer: jobOffer.slice(0, MAX_OFFER_CHARS_FOR_TITLE),
    });

    try {
      const response = await this.completion.generate(prompt);
      const title = stripUnsafeFilenameChars(response.replace(/\s*\r?\n\s*/g, " "))
        .trim()
        .slice(0, MAX_JOB_TITLE_LENGTH)
        .trim();
      return title || null;
    } catch (error) {
      logger.warn("Job title extraction failed", {
        stage: "extracting_title",
        error: describeError(error),
      });
      return null;
    }
  }

  /**
   * Writes a 4-5 line summary aimed at the offer.
   *
   * @returns The tailored summary, or `profile.long_profile` on failure.
   */
  async adaptSummary(
    profile: CanonicalProfile,
    jobOffer: string,
    locale: Locale = detectLanguage(jobOffer),
  ): Promise<string> {
    const parts = PROMPT_LOCALES[locale];
    const prompt = buildPrompt(TAILORING_PROMPTS.ADAPT_SUMMARY, {
      header: parts.header,
      offerLabel: parts.offerLabel,
      summaryInstruction: parts.summaryInstruction,
      jobOffer,
      longProfile: profile.long_profile,
    });

    try {
      const summary = (await this.completion.generate(prompt)).trim();
      if (summary) return summary;
      logger.warn("Summary adaptation returned nothing, using stored profile", {
        stage: "adapting_summary",
      });
    } catch (error) {
      logger.warn("Summary adaptation failed, using stored profile", {
        stage: "adapting_summary",
        error: describeError(error),
      });
    }
    return profile.long_profile;
  }

  /**
   * Picks the most relevant experiences and rewrites their missions.
   *
   * @returns The tailored experiences, or the first stored ones on failure.
   */
  async selectExperiences(
    profile: CanonicalProfile,
    jobOffer: string,
    locale: Locale = detectLanguage(jobOffer),
  ): Promise<Experience[]> {
    const parts = PROMPT_LOCALES[locale];
    const prompt = buildPrompt(TAILORING_PROMPTS.SELECT_EXPERIENCES, {
      header: parts.header,
      offerLabel: parts.offerLabel,
      jobOffer,
      experiences: JSON.stringify(profile.experiences, null, 2),
    });
    const fallback = () => profile.experiences.slice(0, FALLBACK_EXPERIENCE_COUNT);

    let response: string;
    try {
      response = await this.completion.generate(prompt);
    } catch (error) {
      logger.warn("Experience selection failed, using first experiences", {
        stage: "selecting_experiences",
        error: describeError(error),
      });
      return fallback();
    }

    const extracted = extractJsonArray(response);
    const parsed = extracted.ok
      ? tailoredExperiencesSchema.safeParse(extracted.value)
      : undefined;
    if (!parsed?.success || parsed.data.length === 0) {
      logger.warn("Experience selection returned no usable list, using first experiences", {
        stage: "selecting_experiences",
        reason: extracted.ok ? "invalid or empty experience list" : extracted.reason,
      });
      return fallback();
    }
    return parsed.data;
  }

  /**
   * Selects skills as two labeled lines of markup.
   *
   * @returns The parsed lines, or the stored skills on failure.
   */
  async selectSkillsMarkup(
    profile: CanonicalProfile,
    jobOffer: string,
    locale: Locale = detectLanguage(jobOffer),
  ): Promise<SkillsView> {
    const prompt = this.skillsPrompt(TAILORING_PROMPTS.SELECT_SKILLS_MARKUP, profile, jobOffer, locale);

    try {
      const lines = parseSkillMarkup(await this.completion.generate(prompt));
      if (lines) return { kind: "markup", lines };
      logger.warn("Skill selection returned malformed markup, using stored skills", {
        stage: "selecting_skills",
      });
    } catch (error) {
      logger.warn("Skill selection failed, using stored skills", {
        stage: "selecting_skills",
        error: describeError(error),
      });
    }
    return { kind: "structured", skills: profile.skills };
  }

  /**
   * Selects skills as a JSON object of categories.
   *
   * @returns The selected categories, or `profile.skills` unchanged on failure.
   */
  async selectSkills(
    profile: CanonicalProfile,
    jobOffer: string,
    locale: Locale = detectLanguage(jobOffer),
  ): Promise<ProfileSkills> {
    const prompt = this.skillsPrompt(TAILORING_PROMPTS.SELECT_SKILLS_JSON, profile, jobOffer, locale);

    try {
      const extracted = extractJsonObject(await this.completion.generate(prompt));
      const parsed = extracted.ok ? tailoredSkillsSchema.safeParse(extracted.value) : undefined;
      if (parsed?.success) {
        const { technical, soft, methodological } = parsed.data;
        if (methodological !== undefined) return { technical, methodological };
        if (soft !== undefined) return { technical, soft };
        return { technical };
      }
      logger.warn("Skill selection returned no usable object, using stored skills", {
        stage: "selecting_skills",
        reason: extracted.ok ? "missing or mistyped skill lists" : extracted.reason,
      });
    } catch (error) {
      logger.warn("Skill selection failed, using stored skills", {
        stage: "selecting_skills",
        error: describeError(error),
      });
    }
    return profile.skills;
  }

  /**
   * Helper method to build either skill selection prompt.
   */
  private skillsPrompt(
    template: string,
    profile: CanonicalProfile,
    jobOffer: string,
    locale: Locale,
  ): string {
    const parts = PROMPT_LOCALES[locale];
    return buildPrompt(template, {
      header: parts.header,
      offerLabel: parts.offerLabel,
      jobOffer,
      skills: JSON.stringify(profile.skills, null, 2),
    });
  }
}
