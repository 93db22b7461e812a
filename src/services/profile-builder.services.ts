import fs from "fs-extra";
import { fileURLToPath } from "url";
import { z } from "zod";
import { buildPrompt, PROFILE_PROMPTS } from "../prompts";
import {
  manualEntrySchema,
  profileDraftSchema,
  type CanonicalProfile,
  type ManualEntry,
} from "../schemas/profile-schemas";
import { MAX_PROFILE_TEXT_CHARS } from "../utils/constants";
import { ValidationError } from "../utils/errors";
import { extractJsonObject } from "../utils/json-extraction";
import logger, { describeError } from "../utils/logger";
import type { CompletionService } from "./llm.services";

const VOCABULARY_PATH = fileURLToPath(
  new URL("../data/heuristic-vocabulary.json", import.meta.url),
);

const vocabularySchema = z.object({
  technical: z.record(z.string()),
  soft: z.record(z.string()),
  titleKeywords: z.array(z.string()),
  sectionWords: z.array(z.string()),
});

export type HeuristicVocabulary = z.infer<typeof vocabularySchema>;

let cachedVocabulary: HeuristicVocabulary | undefined;

export function loadVocabulary(): HeuristicVocabulary {
  cachedVocabulary ??= vocabularySchema.parse(fs.readJsonSync(VOCABULARY_PATH));
  return cachedVocabulary;
}

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERNS = [
  /(?:\+33\s?|\b0)[1-9](?:[\s.-]?\d{2}){4}\b/,
  /(?:\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/,
];
const NAME_FORBIDDEN_CHARS = /[@•:()—]/;
const HEADER_LINES = 10;
const MAX_NAME_LENGTH = 50;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Labels of every vocabulary keyword found in the text as a whole word.
 */
function scanVocabulary(text: string, vocabulary: Record<string, string>): string[] {
  const found = new Set<string>();
  for (const [keyword, label] of Object.entries(vocabulary)) {
    const pattern = new RegExp(
      `(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}+#])`,
      "iu",
    );
    if (pattern.test(text)) found.add(label);
  }
  return [...found];
}

/**
 * Builds canonical profiles from extracted resume text or from a manual entry.
 */
export class ProfileBuilderService {
  constructor(private readonly completion: CompletionService) {}

  /**
   * Structures raw resume text with the completion service, falling back to
   * the deterministic heuristic when the call fails or the answer has no
   * usable `identity.name`.
   */
  async buildFromText(rawText: string): Promise<CanonicalProfile> {
    const prompt = buildPrompt(PROFILE_PROMPTS.STRUCTURE_PROFILE, {
      resumeText: rawText.slice(0, MAX_PROFILE_TEXT_CHARS),
    });

    let response: string;
    try {
      response = await this.completion.generate(prompt);
    } catch (error) {
      logger.warn("Profile structuring failed, using heuristic extraction", {
        stage: "structuring_profile",
        error: describeError(error),
      });
      return this.buildFromTextHeuristic(rawText);
    }

    const extracted = extractJsonObject(response);
    if (!extracted.ok) {
      logger.warn("Profile structuring returned no JSON, using heuristic extraction", {
        stage: "structuring_profile",
        reason: extracted.reason,
      });
      return this.buildFromTextHeuristic(rawText);
    }

    const draft = profileDraftSchema.safeParse(extracted.value);
    if (!draft.success) {
      logger.warn("Profile structuring returned no identity.name, using heuristic extraction", {
        stage: "structuring_profile",
        issues: draft.error.issues.map((issue) => issue.path.join(".")),
      });
      return this.buildFromTextHeuristic(rawText);
    }

    const { identity, ...rest } = draft.data;
    return {
      identity,
      long_profile: rest.long_profile,
      experiences: rest.experiences,
      skills: rest.skills,
      education: rest.education,
      languages: rest.languages,
      interests: rest.interests,
      memory_notes: {},
    };
  }

  /**
   * LLM-free extraction of the contact block and skill keywords.
   */
  buildFromTextHeuristic(rawText: string): CanonicalProfile {
    const vocabulary = loadVocabulary();
    const headerLines = rawText
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
      .slice(0, HEADER_LINES);

    const containsAny = (line: string, words: string[]) => {
      const lowered = line.toLowerCase();
      return words.some((word) => lowered.includes(word));
    };

    const nameBlacklist = [...vocabulary.titleKeywords, ...vocabulary.sectionWords];
    const name =
      headerLines.find(
        (line) =>
          line.length < MAX_NAME_LENGTH &&
          /^\p{Lu}/u.test(line) &&
          !NAME_FORBIDDEN_CHARS.test(line) &&
          !containsAny(line, nameBlacklist),
      ) ?? "";
    const title =
      headerLines.find((line) => containsAny(line, vocabulary.titleKeywords)) ?? "";

    const email = rawText.match(EMAIL_PATTERN)?.[0] ?? "";
    let phone = "";
    for (const pattern of PHONE_PATTERNS) {
      const match = rawText.match(pattern);
      if (match) {
        phone = match[0].trim();
        break;
      }
    }

    return {
      identity: { name, title, email, phone, location: "" },
      long_profile: title
        ? `Experienced ${title} with a diverse professional background.`
        : "",
      experiences: [],
      skills: {
        technical: scanVocabulary(rawText, vocabulary.technical),
        methodological: scanVocabulary(rawText, vocabulary.soft),
      },
      education: [],
      languages: [],
      interests: [],
      memory_notes: {},
    };
  }

  /**
   * Builds a profile from fields typed in by the candidate, asking the
   * completion service for the summary.
   *
   * @throws ValidationError if the entry has no name or malformed fields.
   */
  async buildFromManualEntry(entry: ManualEntry): Promise<CanonicalProfile> {
    const parsed = manualEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid profile entry: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
      );
    }
    const data = parsed.data;

    return {
      identity: {
        name: data.name,
        title: data.title,
        email: data.email,
        phone: data.phone,
        location: data.location,
      },
      long_profile: await this.writeSummary(
        data.name,
        data.title,
        data.experiences.map((exp) => `${exp.role} at ${exp.company} (${exp.dates})`),
        data.technical_skills,
      ),
      experiences: data.experiences,
      skills: {
        technical: data.technical_skills,
        methodological: data.soft_skills,
      },
      education: data.education,
      languages: data.languages,
      interests: data.interests,
      memory_notes: {},
    };
  }

  /**
   * Helper method to write the summary of a manual entry.
   */
  private async writeSummary(
    name: string,
    title: string,
    experienceLines: string[],
    skills: string[],
  ): Promise<string> {
    const prompt = buildPrompt(PROFILE_PROMPTS.MANUAL_SUMMARY, {
      name,
      title,
      experiences: experienceLines.slice(0, 3).join("\n"),
      skills: skills.slice(0, 5).join(", "),
    });

    try {
      const summary = (await this.completion.generate(prompt)).trim();
      if (summary) return summary;
    } catch (error) {
      logger.warn("Summary generation failed, using template summary", {
        stage: "writing_summary",
        error: describeError(error),
      });
    }
    return fallbackSummary(title, skills);
  }
}

export function fallbackSummary(title: string, skills: string[]): string {
  const role = title || "professional";
  return skills.length > 0
    ? `Experienced ${role} with expertise in ${skills.slice(0, 3).join(", ")}.`
    : `Experienced ${role}.`;
}
