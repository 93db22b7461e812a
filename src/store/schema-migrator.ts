import {
  canonicalProfileSchema,
  educationEntries,
  interestList,
  secondarySkills,
  type CanonicalProfile,
  type EducationEntry,
  type Experience,
} from "../schemas/profile-schemas";
import { isJsonObject, type JsonObject } from "../utils/json-extraction";

export type Dialect = "french" | "spanish";

export type DecodedProfile =
  | { kind: "canonical"; profile: CanonicalProfile }
  | { kind: "repaired"; profile: CanonicalProfile; issues: string[] }
  | { kind: "mixed"; dialects: Dialect[]; profile: CanonicalProfile }
  | { kind: Dialect; raw: JsonObject }
  | { kind: "unrecognized"; raw: JsonObject; issues: string[] };

/**
 * Key names one legacy dialect uses for each canonical field.
 */
export interface DialectMapping {
  dialect: Dialect;
  /** Top-level keys whose presence identifies the dialect. */
  sentinels: readonly string[];
  root: {
    identity: string;
    longProfile: string;
    experiences: string;
    skills: string;
    education: string;
    languages: string;
    interests: string;
    memoryNotes: string;
  };
  identity: {
    name: string;
    title: string;
    email: string;
    phone: string;
    location: string;
  };
  experience: {
    company: string;
    location: string;
    role: string;
    dates: string;
    missions: string;
  };
  skills: { technical: string; methodological: string };
  education: { degree: string; school: string; dates: string };
}

const FRENCH: DialectMapping = {
  dialect: "french",
  sentinels: ["identite", "profil_long", "competences"],
  root: {
    identity: "identite",
    longProfile: "profil_long",
    experiences: "experiences",
    skills: "competences",
    education: "formation",
    languages: "langues",
    interests: "centres_interet",
    memoryNotes: "memory_notes",
  },
  identity: {
    name: "nom",
    title: "titre",
    email: "email",
    phone: "telephone",
    location: "localisation",
  },
  experience: {
    company: "entreprise",
    location: "lieu",
    role: "poste",
    dates: "dates",
    missions: "missions",
  },
  skills: { technical: "techniques", methodological: "methodologiques" },
  education: { degree: "diplome", school: "ecole", dates: "dates" },
};

const SPANISH: DialectMapping = {
  dialect: "spanish",
  sentinels: ["identidad", "perfil_largo", "competencias"],
  root: {
    identity: "identidad",
    longProfile: "perfil_largo",
    experiences: "experiencias",
    skills: "competencias",
    education: "formacion",
    languages: "idiomas",
    interests: "intereses",
    memoryNotes: "memory_notes",
  },
  identity: {
    name: "nombre",
    title: "titulo",
    email: "correo",
    phone: "telefono",
    location: "ubicacion",
  },
  experience: {
    company: "empresa",
    location: "lugar",
    role: "puesto",
    dates: "fechas",
    missions: "misiones",
  },
  skills: { technical: "tecnicas", methodological: "metodologicas" },
  education: { degree: "titulo", school: "centro", dates: "fechas" },
};

/** Legacy dialects in detection priority order. */
export const LEGACY_DIALECTS: readonly DialectMapping[] = [FRENCH, SPANISH];

function asString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

function asStringList(value: unknown): string[] {
  if (typeof value === "string") return value ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item) => typeof item === "string" || typeof item === "number")
    .map((item) => String(item));
}

function asObject(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

function asObjectList(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

function asStringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(asObject(value))) {
    if (typeof entry === "string") record[key] = entry;
  }
  return record;
}

function convertEducation(
  value: unknown,
  keys: DialectMapping["education"],
): string | EducationEntry[] {
  if (typeof value === "string") return value;
  if (!Array.isArray(value)) return "";

  return value.flatMap((entry): EducationEntry[] => {
    if (typeof entry === "string") {
      return [{ degree: entry, school: "", dates: "" }];
    }
    if (!isJsonObject(entry)) return [];
    return [
      {
        degree: asString(entry[keys.degree]),
        school: asString(entry[keys.school]),
        dates: asString(entry[keys.dates]),
      },
    ];
  });
}

function convertInterests(value: unknown): string | string[] {
  return typeof value === "string" ? value : asStringList(value);
}

/**
 * Converts a document written in a legacy dialect into the canonical schema.
 * Missing or mistyped fields become empty values.
 */
export function convertLegacyProfile(
  raw: JsonObject,
  dialect: Dialect,
): CanonicalProfile {
  const mapping = LEGACY_DIALECTS.find((entry) => entry.dialect === dialect);
  if (!mapping) {
    throw new Error(`No mapping registered for dialect "${dialect}"`);
  }

  const keys = mapping.root;
  const identity = asObject(raw[keys.identity]);
  const skills = asObject(raw[keys.skills]);

  const contact: { email?: string; phone?: string; location?: string } = {};
  for (const field of ["email", "phone", "location"] as const) {
    const legacyKey = mapping.identity[field];
    if (Object.hasOwn(identity, legacyKey)) {
      contact[field] = asString(identity[legacyKey]);
    }
  }

  const experiences = asObjectList(raw[keys.experiences]).map(
    (entry): Experience => ({
      company: asString(entry[mapping.experience.company]),
      location: asString(entry[mapping.experience.location]),
      role: asString(entry[mapping.experience.role]),
      dates: asString(entry[mapping.experience.dates]),
      missions: asStringList(entry[mapping.experience.missions]),
    }),
  );

  return {
    identity: {
      name: asString(identity[mapping.identity.name]),
      title: asString(identity[mapping.identity.title]),
      ...contact,
    },
    long_profile: asString(raw[keys.longProfile]),
    experiences,
    skills: {
      technical: asStringList(skills[mapping.skills.technical]),
      methodological: asStringList(skills[mapping.skills.methodological]),
    },
    education: convertEducation(raw[keys.education], mapping.education),
    languages: asStringList(raw[keys.languages]),
    interests: convertInterests(raw[keys.interests]),
    memory_notes: asStringRecord(raw[keys.memoryNotes]),
  };
}

const CANONICAL_KEYS: ReadonlySet<string> = new Set(
  Object.keys(canonicalProfileSchema.shape),
);

const CANONICAL_EDUCATION_KEYS: DialectMapping["education"] = {
  degree: "degree",
  school: "school",
  dates: "dates",
};

function optionalList(source: JsonObject, key: string): string[] | undefined {
  return Object.hasOwn(source, key) ? asStringList(source[key]) : undefined;
}

function optionalString(source: JsonObject, key: string): string | undefined {
  return Object.hasOwn(source, key) ? asString(source[key]) : undefined;
}

/**
 * Coerces a document written with canonical keys into the canonical types.
 * Null or mistyped fields become empty values; optional fields stay absent
 * when absent. Unknown top-level keys are kept.
 */
export function normalizeCanonicalProfile(raw: JsonObject): CanonicalProfile {
  const identity = asObject(raw.identity);
  const skills = asObject(raw.skills);

  const profile: CanonicalProfile = {
    identity: {
      name: asString(identity.name),
      title: asString(identity.title),
    },
    long_profile: asString(raw.long_profile),
    experiences: asObjectList(raw.experiences).map(
      (entry): Experience => ({
        company: asString(entry.company),
        location: asString(entry.location),
        role: asString(entry.role),
        dates: asString(entry.dates),
        missions: asStringList(entry.missions),
      }),
    ),
    skills: { technical: asStringList(skills.technical) },
    education: convertEducation(
      isJsonObject(raw.education) ? [raw.education] : raw.education,
      CANONICAL_EDUCATION_KEYS,
    ),
    languages: asStringList(raw.languages),
  };

  for (const field of ["email", "phone", "location"] as const) {
    const value = optionalString(identity, field);
    if (value !== undefined) profile.identity[field] = value;
  }
  const methodological = optionalList(skills, "methodological");
  if (methodological) profile.skills.methodological = methodological;
  const soft = optionalList(skills, "soft");
  if (soft) profile.skills.soft = soft;
  if (Object.hasOwn(raw, "interests")) {
    profile.interests = convertInterests(raw.interests);
  }
  if (Object.hasOwn(raw, "memory_notes")) {
    profile.memory_notes = asStringRecord(raw.memory_notes);
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!CANONICAL_KEYS.has(key)) profile[key] = value;
  }
  return profile;
}

function isBlankExperience(experience: Experience): boolean {
  return (
    !experience.company &&
    !experience.role &&
    !experience.dates &&
    experience.missions.length === 0
  );
}

/**
 * Fills the empty fields of a canonical profile from a converted legacy one.
 * Non-empty canonical values always win.
 */
function fillEmptyFields(
  profile: CanonicalProfile,
  legacy: CanonicalProfile,
): CanonicalProfile {
  const filled: CanonicalProfile = {
    ...profile,
    identity: { ...profile.identity },
    skills: { ...profile.skills },
  };

  for (const field of ["name", "title", "email", "phone", "location"] as const) {
    const value = legacy.identity[field];
    if (!filled.identity[field] && value) filled.identity[field] = value;
  }
  if (!filled.long_profile) filled.long_profile = legacy.long_profile;
  if (
    filled.experiences.every(isBlankExperience) &&
    !legacy.experiences.every(isBlankExperience)
  ) {
    filled.experiences = legacy.experiences;
  }
  if (filled.skills.technical.length === 0) {
    filled.skills.technical = legacy.skills.technical;
  }
  const legacySecondary = secondarySkills(legacy.skills);
  if (secondarySkills(filled.skills).length === 0 && legacySecondary.length > 0) {
    filled.skills.methodological = legacySecondary;
  }
  if (educationEntries(filled.education).length === 0) {
    filled.education = legacy.education;
  }
  if (filled.languages.length === 0) filled.languages = legacy.languages;
  if (interestList(filled.interests).length === 0 && legacy.interests !== undefined) {
    filled.interests = legacy.interests;
  }
  filled.memory_notes = { ...legacy.memory_notes, ...profile.memory_notes };
  return filled;
}

/**
 * Heals a document carrying canonical `identity` next to legacy keys: the
 * legacy values fill the canonical gaps and the legacy keys are dropped.
 */
function mergeLegacyFields(
  raw: JsonObject,
  mappings: readonly DialectMapping[],
): CanonicalProfile {
  const legacyKeys = new Set(
    mappings
      .flatMap((mapping) => Object.values(mapping.root))
      .filter((key) => !CANONICAL_KEYS.has(key)),
  );
  const canonicalPart = Object.fromEntries(
    Object.entries(raw).filter(([key]) => !legacyKeys.has(key)),
  );

  return mappings.reduce(
    (profile, mapping) =>
      fillEmptyFields(profile, convertLegacyProfile(raw, mapping.dialect)),
    normalizeCanonicalProfile(canonicalPart),
  );
}

/**
 * Classifies a raw document.
 *
 * Documents with legacy sentinels and no canonical `identity` are tagged with
 * the first matching dialect. Sentinels next to a canonical `identity` give a
 * `mixed` document, already merged. Otherwise the canonical decode runs;
 * documents with an `identity` object that fail it are coerced (`repaired`).
 */
export function decodeProfile(raw: JsonObject): DecodedProfile {
  const dialects = LEGACY_DIALECTS.filter((mapping) =>
    mapping.sentinels.some((key) => Object.hasOwn(raw, key)),
  );
  const hasIdentity = isJsonObject(raw.identity);

  const [primary] = dialects;
  if (primary && !hasIdentity) {
    return { kind: primary.dialect, raw };
  }
  if (dialects.length > 0) {
    return {
      kind: "mixed",
      dialects: dialects.map((mapping) => mapping.dialect),
      profile: mergeLegacyFields(raw, dialects),
    };
  }

  const canonical = canonicalProfileSchema.safeParse(raw);
  if (canonical.success) {
    return { kind: "canonical", profile: canonical.data };
  }

  const issues = canonical.error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
  return hasIdentity
    ? { kind: "repaired", profile: normalizeCanonicalProfile(raw), issues }
    : { kind: "unrecognized", raw, issues };
}

/**
 * Returns the canonical form of a legacy or mixed document. Canonical,
 * repaired and unrecognized documents come back unchanged, so the operation
 * is idempotent.
 */
export function migrate(raw: JsonObject): JsonObject {
  const decoded = decodeProfile(raw);
  switch (decoded.kind) {
    case "canonical":
    case "repaired":
    case "unrecognized":
      return raw;
    case "mixed":
      return decoded.profile;
    default:
      return convertLegacyProfile(decoded.raw, decoded.kind);
  }
}
