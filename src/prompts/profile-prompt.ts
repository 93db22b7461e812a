/**
 * Prompts for turning raw resume text or a manual entry into a structured profile.
 */
export const PROFILE_PROMPTS = {
  /* Prompt to structure extracted resume text into the canonical profile JSON. */
  STRUCTURE_PROFILE: `
    Analyze this resume and return ONLY valid JSON with this exact structure:

    {
      "identity": {
        "name": "Full Name",
        "title": "Professional Title",
        "email": "email@example.com",
        "phone": "phone number",
        "location": "city, country"
      },
      "long_profile": "4-5 line professional summary",
      "experiences": [
        {
          "company": "Company Name",
          "location": "City",
          "role": "Job Title",
          "dates": "YYYY-YYYY",
          "missions": ["mission 1", "mission 2", "mission 3"]
        }
      ],
      "education": [
        {
          "degree": "Degree",
          "school": "School",
          "dates": "YYYY-YYYY"
        }
      ],
      "skills": {
        "technical": ["skill1", "skill2"],
        "methodological": ["skill1", "skill2"]
      },
      "languages": ["Language (level)"],
      "interests": ["interest1"]
    }

    Keep experiences in the order they appear in the resume. Use empty strings or
    empty lists for anything the resume does not mention.

    RESUME:
    {resumeText}

    Return ONLY the JSON:
  `,

  /* Prompt to write a summary for a profile entered by hand. */
  MANUAL_SUMMARY: `
    Create a professional 3-4 line summary for this candidate:

    Name: {name}
    Title: {title}
    Recent Experience:
    {experiences}
    Key Skills: {skills}

    Write a compelling professional summary that highlights their expertise and experience.
    Return ONLY the summary paragraph.
  `,
};
