import type { Locale } from "../schemas/profile-schemas";

interface LocalizedPromptParts {
  header: string;
  offerLabel: string;
  titleInstruction: string;
  summaryInstruction: string;
}

/* Prompt fragments in the language of the job offer. */
export const PROMPT_LOCALES: Record<Locale, LocalizedPromptParts> = {
  en: {
    header: "You are a resume writing expert.",
    offerLabel: "JOB OFFER:",
    titleInstruction:
      "Extract the job title from this offer. Return ONLY the title, nothing else.",
    summaryInstruction:
      "Write a 4-5 line profile paragraph highlighting the most relevant points for this offer. Use keywords from the offer. Be specific and impactful. Return ONLY the paragraph without any preface or comments.",
  },
  fr: {
    header: "Vous êtes un expert en rédaction de CV.",
    offerLabel: "OFFRE D'EMPLOI:",
    titleInstruction:
      "Extrayez l'intitulé du poste de cette offre. Retournez UNIQUEMENT le titre, rien d'autre.",
    summaryInstruction:
      "Rédigez un paragraphe de 4-5 lignes mettant en avant les points les plus pertinents pour cette offre. Utilisez les mots-clés de l'offre. Soyez précis et percutant. Retournez UNIQUEMENT le paragraphe sans préface ni commentaires.",
  },
  es: {
    header: "Eres un experto en redacción de CV.",
    offerLabel: "OFERTA DE EMPLEO:",
    titleInstruction:
      "Extrae el título del puesto de esta oferta. Devuelve SOLO el título, nada más.",
    summaryInstruction:
      "Escribe un párrafo de 4-5 líneas destacando los puntos más relevantes para esta oferta. Usa palabras clave de la oferta. Sé específico e impactante. Devuelve SOLO el párrafo sin prefacio ni comentarios.",
  },
};

/**
 * Prompts for tailoring a stored profile to one job offer.
 * `{header}`, `{offerLabel}` and the instructions come from PROMPT_LOCALES.
 */
export const TAILORING_PROMPTS = {
  EXTRACT_TITLE: `
    {titleInstruction}

    Offer:
    {jobOffer}

    Job title:
  `,

  ADAPT_SUMMARY: `
    {header}

    {offerLabel}
    {jobOffer}

    FULL CANDIDATE PROFILE:
    {longProfile}

    {summaryInstruction}
  `,

  SELECT_EXPERIENCES: `
    {header}

    {offerLabel}
    {jobOffer}

    CANDIDATE EXPERIENCES (JSON):
    {experiences}

    Select the 2-3 MOST relevant experiences and adapt missions to match the offer.
    For each experience, keep 4-5 detailed missions showcasing requested competencies.
    Write the missions in the language of the offer.

    IMPORTANT: Use REAL values from the JSON (real company names, cities, dates).

    Return ONLY a valid JSON array of objects with this schema:
    [
      {
        "company": "Exact company name",
        "location": "Exact city",
        "role": "Exact role title",
        "dates": "Real dates",
        "missions": ["detailed mission 1", "detailed mission 2", "detailed mission 3", "detailed mission 4"]
      }
    ]
  `,

  SELECT_SKILLS_MARKUP: `
    {header}

    {offerLabel}
    {jobOffer}

    CANDIDATE SKILLS:
    {skills}

    Select the relevant skills for this offer (8-10 per category). Prioritize skills mentioned in the offer.
    Return ONLY this exact HTML-like format:
    <b>Technical:</b> skill1, skill2, skill3, skill4, skill5, skill6, skill7, skill8<br/>
    <b>Management & Methods:</b> skill1, skill2, skill3, skill4, skill5, skill6
  `,

  SELECT_SKILLS_JSON: `
    {header}

    {offerLabel}
    {jobOffer}

    CANDIDATE SKILLS:
    {skills}

    Select the relevant skills for this offer (8-10 per category). Prioritize skills mentioned in the offer.
    Return ONLY a valid JSON object with this schema:
    {
      "technical": ["skill1", "skill2"],
      "soft": ["skill1", "skill2"]
    }
  `,
};
