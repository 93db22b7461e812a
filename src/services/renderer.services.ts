import PdfPrinter from "pdfmake";
import type { Content, StyleDictionary, TDocumentDefinitions } from "pdfmake/interfaces";
import {
  educationEntries,
  interestList,
  secondarySkills,
  type CanonicalProfile,
  type Experience,
  type Locale,
} from "../schemas/profile-schemas";
import { AppError } from "../utils/errors";
import logger, { describeError } from "../utils/logger";
import type { SkillsView } from "./job-adapter.services";

export interface RenderInput {
  profile: CanonicalProfile;
  summary: string;
  experiences: Experience[];
  skills: SkillsView;
  locale: Locale;
}

/**
 * Turns a tailored profile into PDF bytes.
 */
export interface DocumentRenderer {
  render(input: RenderInput): Promise<Buffer>;
}

interface SectionLabels {
  profile: string;
  experience: string;
  skills: string;
  education: string;
  languages: string;
  interests: string;
  technical: string;
  secondary: string;
}

export const SECTION_LABELS: Record<Locale, SectionLabels> = {
  en: {
    profile: "Profile",
    experience: "Professional Experience",
    skills: "Skills",
    education: "Education",
    languages: "Languages",
    interests: "Interests",
    technical: "Technical",
    secondary: "Management & Methods",
  },
  fr: {
    profile: "Profil",
    experience: "Expérience professionnelle",
    skills: "Compétences",
    education: "Formation",
    languages: "Langues",
    interests: "Centres d'intérêt",
    technical: "Techniques",
    secondary: "Management & Méthodes",
  },
  es: {
    profile: "Perfil",
    experience: "Experiencia profesional",
    skills: "Competencias",
    education: "Formación",
    languages: "Idiomas",
    interests: "Intereses",
    technical: "Técnicas",
    secondary: "Gestión y Métodos",
  },
};

// Use standard fonts that pdfmake bundles
const fonts = {
  Helvetica: {
    normal: "Helvetica",
    bold: "Helvetica-Bold",
    italics: "Helvetica-Oblique",
    bolditalics: "Helvetica-BoldOblique",
  },
};

const styles: StyleDictionary = {
  name: { fontSize: 20, bold: true, color: "#1f2937" },
  title: { fontSize: 12, color: "#2563eb", margin: [0, 2, 0, 2] },
  contact: { fontSize: 9, color: "#4b5563", margin: [0, 0, 0, 6] },
  section: { fontSize: 12, bold: true, color: "#1f2937", margin: [0, 10, 0, 4] },
  role: { fontSize: 10, bold: true },
  meta: { fontSize: 9, italics: true, color: "#4b5563", margin: [0, 0, 0, 2] },
};

function sectionHeader(text: string): Content[] {
  return [
    { text: text.toUpperCase(), style: "section" },
    {
      canvas: [{ type: "line", x1: 0, y1: 0, x2: 515, y2: 0, lineWidth: 0.5, lineColor: "#9ca3af" }],
      margin: [0, 0, 0, 4],
    },
  ];
}

function experienceBlock(experience: Experience): Content {
  const meta = [experience.location, experience.dates].filter(Boolean).join(" | ");
  const heading = [experience.role, experience.company].filter(Boolean).join(" - ");

  const stack: Content[] = [{ text: heading, style: "role" }];
  if (meta) stack.push({ text: meta, style: "meta" });
  if (experience.missions.length > 0) {
    stack.push({ ul: experience.missions, margin: [0, 0, 0, 6] });
  }
  return { stack, unbreakable: true };
}

function skillLines(skills: SkillsView, labels: SectionLabels): Content[] {
  const lines =
    skills.kind === "markup"
      ? skills.lines
      : [
          { label: labels.technical, items: skills.skills.technical },
          { label: labels.secondary, items: secondarySkills(skills.skills) },
        ].filter((line) => line.items.length > 0);

  return lines.map((line): Content => ({
    text: [{ text: `${line.label}: `, bold: true }, line.items.join(", ")],
    margin: [0, 0, 0, 2],
  }));
}

/**
 * Builds the single-column pdfmake document for a tailored resume.
 */
export function buildResumeDocument(input: RenderInput): TDocumentDefinitions {
  const { profile, summary, experiences, skills, locale } = input;
  const labels = SECTION_LABELS[locale];
  const { identity } = profile;
  const contact = [identity.email, identity.phone, identity.location].filter(Boolean).join("  |  ");

  const content: Content[] = [
    { text: identity.name, style: "name" },
    { text: identity.title, style: "title" },
    ...(contact ? [{ text: contact, style: "contact" }] : []),
    ...sectionHeader(labels.profile),
    { text: summary, alignment: "justify" },
    ...sectionHeader(labels.experience),
    ...experiences.map(experienceBlock),
    ...sectionHeader(labels.skills),
    ...skillLines(skills, labels),
  ];

  const education = educationEntries(profile.education);
  if (education.length > 0) {
    content.push(
      ...sectionHeader(labels.education),
      ...education.map(
        (entry): Content => ({
          text: [
            { text: entry.degree, bold: true },
            [entry.school, entry.dates].filter(Boolean).map((part) => ` - ${part}`).join(""),
          ],
          margin: [0, 0, 0, 2],
        }),
      ),
    );
  }

  if (profile.languages.length > 0) {
    content.push(...sectionHeader(labels.languages), { text: profile.languages.join(" | ") });
  }

  const interests = interestList(profile.interests);
  if (interests.length > 0) {
    content.push(...sectionHeader(labels.interests), { text: interests.join(", ") });
  }

  return {
    pageSize: "A4",
    pageMargins: [40, 40, 40, 40],
    info: { title: `${identity.name} - ${identity.title}`, author: identity.name },
    defaultStyle: { font: "Helvetica", fontSize: 10, lineHeight: 1.2 },
    styles,
    content,
  };
}

/**
 * Renders resumes with pdfmake and the standard PDF fonts.
 */
export class PdfResumeRenderer implements DocumentRenderer {
  private printer = new PdfPrinter(fonts);

  /**
   * @throws AppError if pdfmake fails to produce the document.
   */
  render(input: RenderInput): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const handleError = (error: unknown) => {
        logger.error("Resume rendering failed", { error: describeError(error) });
        reject(new AppError(`Failed to render resume: ${describeError(error)}`, 500, { cause: error }));
      };

      try {
        const pdfDoc = this.printer.createPdfKitDocument(buildResumeDocument(input));
        const chunks: Buffer[] = [];

        pdfDoc.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });
        pdfDoc.on("end", () => {
          resolve(Buffer.concat(chunks));
        });
        pdfDoc.on("error", handleError);

        pdfDoc.end();
      } catch (error) {
        handleError(error);
      }
    });
  }
}
