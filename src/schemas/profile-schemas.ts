import { z } from "zod";

export const LOCALES = ["en", "fr", "es"] as const;
export type Locale = (typeof LOCALES)[number];

/* Canonical (stored) shapes. Defaults only apply to absent keys. */

export const experienceSchema = z
  .object({
    company: z.string().default(""),
    location: z.string().default(""),
    role: z.string().default(""),
    dates: z.string().default(""),
    missions: z.array(z.string()).default([]),
  })
  .passthrough();

export const educationEntrySchema = z
  .object({
    degree: z.string().default(""),
    school: z.string().default(""),
    dates: z.string().default(""),
  })
  .passthrough();

export const skillsSchema = z
  .object({
    technical: z.array(z.string()).default([]),
    methodological: z.array(z.string()).optional(),
    soft: z.array(z.string()).optional(),
  })
  .passthrough();

export const identitySchema = z
  .object({
    name: z.string(),
    title: z.string(),
    email: z.string().optional(),
    phone: z.string().optional(),
    location: z.string().optional(),
  })
  .passthrough();

export const canonicalProfileSchema = z
  .object({
    identity: identitySchema,
    long_profile: z.string().default(""),
    experiences: z.array(experienceSchema).default([]),
    skills: skillsSchema.default({ technical: [] }),
    education: z
      .union([z.string(), z.array(educationEntrySchema)])
      .default(""),
    languages: z.array(z.string()).default([]),
    interests: z.union([z.array(z.string()), z.string()]).optional(),
    memory_notes: z.record(z.string()).optional(),
  })
  .passthrough();

export type Experience = z.infer<typeof experienceSchema>;
export type EducationEntry = z.infer<typeof educationEntrySchema>;
export type ProfileSkills = z.infer<typeof skillsSchema>;
export type Identity = z.infer<typeof identitySchema>;
export type CanonicalProfile = z.infer<typeof canonicalProfileSchema>;

/* Lenient shapes for model output and manual entry */

const lenientString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? "" : String(value).trim()));

const lenientStringList = z
  .array(z.union([z.string(), z.number()]))
  .nullish()
  .transform((values) =>
    (values ?? []).map((value) => String(value).trim()).filter(Boolean),
  );

export const draftExperienceSchema = z.object({
  company: lenientString,
  location: lenientString,
  role: lenientString,
  dates: lenientString,
  missions: lenientStringList,
});

const draftEducationEntrySchema = z.object({
  degree: lenientString,
  school: lenientString,
  dates: lenientString,
});

/*
 * Structuring answers: a malformed field falls back to its empty value
 * instead of failing the whole document.
 */

const coercedString = lenientString.catch("");

const coercedStringList = z
  .union([z.array(z.union([z.string(), z.number()]).nullish()), z.string()])
  .nullish()
  .transform((values) => {
    const items = typeof values === "string" ? [values] : (values ?? []);
    return items
      .flatMap((value) => (value == null ? [] : [String(value).trim()]))
      .filter(Boolean);
  })
  .catch([]);

const coercedExperienceSchema = z.object({
  company: coercedString,
  location: coercedString,
  role: coercedString,
  dates: coercedString,
  missions: coercedStringList,
});

const coercedEducationEntrySchema = z.object({
  degree: coercedString,
  school: coercedString,
  dates: coercedString,
});

type CoercedExperience = z.output<typeof coercedExperienceSchema>;
type CoercedEducationEntry = z.output<typeof coercedEducationEntrySchema>;

const educationLineSchema = z
  .string()
  .transform((degree) => ({ degree: degree.trim(), school: "", dates: "" }));

/** Shape of the structuring prompt's answer, normalized into a canonical profile. */
export const profileDraftSchema = z.object({
  identity: z.object({
    name: z.string().trim().min(1),
    title: coercedString,
    email: coercedString,
    phone: coercedString,
    location: coercedString,
  }),
  long_profile: coercedString,
  experiences: z
    .array(coercedExperienceSchema.nullable().catch(null))
    .nullish()
    .transform((values) =>
      (values ?? []).filter((value): value is CoercedExperience => value !== null),
    )
    .catch([]),
  skills: z
    .object({
      technical: coercedStringList,
      methodological: coercedStringList.optional(),
      soft: coercedStringList.optional(),
    })
    .nullish()
    .transform((value) => ({
      technical: value?.technical ?? [],
      methodological: value?.methodological ?? value?.soft ?? [],
    }))
    .catch({ technical: [], methodological: [] }),
  education: z
    .union([
      z.string(),
      z.array(
        z.union([educationLineSchema, coercedEducationEntrySchema]).nullable().catch(null),
      ),
      coercedEducationEntrySchema,
    ])
    .nullish()
    .transform((value): string | CoercedEducationEntry[] => {
      if (value == null) return [];
      if (typeof value === "string") return value;
      if (!Array.isArray(value)) return [value];
      return value.filter((entry): entry is CoercedEducationEntry => entry !== null);
    })
    .catch([]),
  languages: coercedStringList,
  interests: z.union([z.string(), coercedStringList]).catch([]),
});

export type ProfileDraft = z.infer<typeof profileDraftSchema>;

const commaList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    const items = typeof value === "string" ? value.split(",") : (value ?? []);
    return items.map((item) => item.trim()).filter(Boolean);
  });

export const manualEntrySchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  title: lenientString,
  email: lenientString,
  phone: lenientString,
  location: lenientString,
  experiences: z
    .array(draftExperienceSchema)
    .nullish()
    .transform((value) => value ?? []),
  education: z
    .array(draftEducationEntrySchema)
    .nullish()
    .transform((value) => value ?? []),
  technical_skills: commaList,
  soft_skills: commaList,
  languages: commaList,
  interests: commaList,
});

export type ManualEntry = z.input<typeof manualEntrySchema>;
export type ParsedManualEntry = z.output<typeof manualEntrySchema>;

export const adaptationNoteSchema = z.object({
  job_title: z.string().trim().min(1, "job_title is required"),
  note: z.string().trim().min(1, "note is required"),
});

export const tailorRequestSchema = z.object({
  job_offer: z.string().trim().min(1, "job_offer is required"),
  skills_format: z.enum(["markup", "structured"]).default("markup"),
});

/**
 * Structured view of `education`, whichever shape is stored.
 */
export function educationEntries(
  education: CanonicalProfile["education"],
): EducationEntry[] {
  if (typeof education === "string") {
    const text = education.trim();
    return text ? [{ degree: text, school: "", dates: "" }] : [];
  }
  return education;
}

/**
 * Secondary skill category, whichever key the profile was written with.
 */
export function secondarySkills(skills: ProfileSkills): string[] {
  return skills.methodological ?? skills.soft ?? [];
}

export function interestList(interests: CanonicalProfile["interests"]): string[] {
  if (interests === undefined) return [];
  if (typeof interests === "string") {
    return interests
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return interests;
}
