import { describe, expect, it } from "vitest";
import {
  createCompletionStub,
  createFailingCompletion,
} from "../../testing/completion-stub";
import { ValidationError } from "../../utils/errors";
import { fallbackSummary, ProfileBuilderService } from "../profile-builder.services";

const resumeText = [
  "Marie Curie",
  "Senior Data Engineer",
  "marie.curie@example.com | 06 12 34 56 78",
  "Paris, France",
  "PROFIL",
  "Data engineer with Python, SQL and Docker. Strong communication and leadership.",
  "Email me anytime.",
].join("\n");

describe("ProfileBuilderService.buildFromTextHeuristic", () => {
  const builder = new ProfileBuilderService(createFailingCompletion());

  it("extracts the contact block and skill keywords", () => {
    expect(builder.buildFromTextHeuristic(resumeText)).toEqual({
      identity: {
        name: "Marie Curie",
        title: "Senior Data Engineer",
        email: "marie.curie@example.com",
        phone: "06 12 34 56 78",
        location: "",
      },
      long_profile: "Experienced Senior Data Engineer with a diverse professional background.",
      experiences: [],
      skills: {
        technical: ["Python", "SQL", "Docker", "Data"],
        methodological: ["Communication", "Leadership"],
      },
      education: [],
      languages: [],
      interests: [],
      memory_notes: {},
    });
  });

  it("skips header lines that cannot be a name", () => {
    const text = [
      "Curriculum Vitae",
      "jean@example.org",
      "Jean Martin (Lyon)",
      "Jean Martin",
      "Chef de projet",
      "+33 6 12 34 56 78",
    ].join("\n");

    const profile = builder.buildFromTextHeuristic(text);
    expect(profile.identity).toEqual({
      name: "Jean Martin",
      title: "Chef de projet",
      email: "jean@example.org",
      phone: "+33 6 12 34 56 78",
      location: "",
    });
  });

  it("falls back to the north-american phone format", () => {
    const profile = builder.buildFromTextHeuristic("Call me at (555) 123-4567");
    expect(profile.identity.phone).toBe("(555) 123-4567");
  });

  it("does not match skill keywords inside other words", () => {
    const profile = builder.buildFromTextHeuristic("Contact by email, daily.");
    expect(profile.skills.technical).toEqual([]);
  });

  it("leaves every field empty when nothing matches", () => {
    const profile = builder.buildFromTextHeuristic("nothing useful here");
    expect(profile.identity.name).toBe("");
    expect(profile.identity.title).toBe("");
    expect(profile.long_profile).toBe("");
  });
});

describe("ProfileBuilderService.buildFromText", () => {
  it("normalizes a structured answer into a canonical profile", async () => {
    const completion = createCompletionStub();
    completion.generate.mockResolvedValueOnce(
      [
        "Here is the profile:",
        "```json",
        JSON.stringify({
          identity: { name: "Marie Curie", title: "Data Engineer", email: "marie@example.com" },
          long_profile: "Builds pipelines.",
          experiences: [
            { company: "Acme", role: "Engineer", dates: "2020-2024", missions: ["Pipelines"] },
          ],
          skills: { technical: ["Python"], soft: ["Communication"] },
          education: "MSc Data Science",
          languages: ["French (native)"],
        }),
        "```",
      ].join("\n"),
    );

    const profile = await new ProfileBuilderService(completion).buildFromText(resumeText);

    expect(profile).toEqual({
      identity: {
        name: "Marie Curie",
        title: "Data Engineer",
        email: "marie@example.com",
        phone: "",
        location: "",
      },
      long_profile: "Builds pipelines.",
      experiences: [
        {
          company: "Acme",
          location: "",
          role: "Engineer",
          dates: "2020-2024",
          missions: ["Pipelines"],
        },
      ],
      skills: { technical: ["Python"], methodological: ["Communication"] },
      education: "MSc Data Science",
      languages: ["French (native)"],
      interests: [],
      memory_notes: {},
    });
  });

  it("keeps the answer when single fields are malformed", async () => {
    const completion = createCompletionStub();
    completion.generate.mockResolvedValueOnce(
      JSON.stringify({
        identity: { name: "Marie Curie", title: "Data Engineer" },
        long_profile: "Builds pipelines.",
        experiences: [
          { company: "Acme", role: "Engineer", dates: "2020-2024", missions: "Pipelines" },
          null,
        ],
        skills: { technical: ["Python", null] },
        education: { degree: "MSc Data Science", school: "EPFL", dates: "2019" },
        languages: "French",
      }),
    );

    const profile = await new ProfileBuilderService(completion).buildFromText(resumeText);

    expect(profile).toEqual({
      identity: {
        name: "Marie Curie",
        title: "Data Engineer",
        email: "",
        phone: "",
        location: "",
      },
      long_profile: "Builds pipelines.",
      experiences: [
        {
          company: "Acme",
          location: "",
          role: "Engineer",
          dates: "2020-2024",
          missions: ["Pipelines"],
        },
      ],
      skills: { technical: ["Python"], methodological: [] },
      education: [{ degree: "MSc Data Science", school: "EPFL", dates: "2019" }],
      languages: ["French"],
      interests: [],
      memory_notes: {},
    });
  });

  it("embeds at most 3000 characters of the resume in the prompt", async () => {
    const completion = createFailingCompletion();
    await new ProfileBuilderService(completion).buildFromText("x".repeat(5000));

    const prompt = completion.generate.mock.calls[0][0];
    expect(prompt).toContain("x".repeat(3000));
    expect(prompt).not.toContain("x".repeat(3001));
  });

  it("uses the heuristic when the completion fails", async () => {
    const builder = new ProfileBuilderService(createFailingCompletion());
    await expect(builder.buildFromText(resumeText)).resolves.toEqual(
      builder.buildFromTextHeuristic(resumeText),
    );
  });

  it("uses the heuristic when the answer has no name", async () => {
    const completion = createCompletionStub();
    completion.generate.mockResolvedValueOnce('{"identity": {"title": "Engineer"}}');
    const builder = new ProfileBuilderService(completion);

    const profile = await builder.buildFromText(resumeText);
    expect(profile.identity.name).toBe("Marie Curie");
    expect(profile.identity.title).toBe("Senior Data Engineer");
  });

  it("uses the heuristic when the answer is not JSON", async () => {
    const completion = createCompletionStub();
    completion.generate.mockResolvedValueOnce("I could not read this resume.");
    const profile = await new ProfileBuilderService(completion).buildFromText(resumeText);
    expect(profile.skills.technical).toEqual(["Python", "SQL", "Docker", "Data"]);
  });
});

describe("ProfileBuilderService.buildFromManualEntry", () => {
  const entry = {
    name: "Ana Dupont",
    title: "QA Lead",
    experiences: [{ company: "Acme", role: "QA Engineer", dates: "2019-2024" }],
    technical_skills: "Selenium, Cypress, Playwright, k6",
    soft_skills: ["Coaching"],
    languages: "French, English",
  };

  it("builds the profile with a generated summary", async () => {
    const completion = createCompletionStub();
    completion.generate.mockResolvedValueOnce("  Seasoned QA lead.  ");

    const profile = await new ProfileBuilderService(completion).buildFromManualEntry(entry);

    expect(profile).toEqual({
      identity: { name: "Ana Dupont", title: "QA Lead", email: "", phone: "", location: "" },
      long_profile: "Seasoned QA lead.",
      experiences: [
        { company: "Acme", location: "", role: "QA Engineer", dates: "2019-2024", missions: [] },
      ],
      skills: {
        technical: ["Selenium", "Cypress", "Playwright", "k6"],
        methodological: ["Coaching"],
      },
      education: [],
      languages: ["French", "English"],
      interests: [],
      memory_notes: {},
    });

    const prompt = completion.generate.mock.calls[0][0];
    expect(prompt).toContain("QA Engineer at Acme (2019-2024)");
    expect(prompt).toContain("Key Skills: Selenium, Cypress, Playwright, k6");
  });

  it("falls back to a template summary when the completion fails", async () => {
    const profile = await new ProfileBuilderService(
      createFailingCompletion(),
    ).buildFromManualEntry(entry);
    expect(profile.long_profile).toBe(
      "Experienced QA Lead with expertise in Selenium, Cypress, Playwright.",
    );
  });

  it("rejects entries without a name", async () => {
    const builder = new ProfileBuilderService(createFailingCompletion());
    await expect(builder.buildFromManualEntry({ name: "  " })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});

describe("fallbackSummary", () => {
  it("omits the skill clause when there are no skills", () => {
    expect(fallbackSummary("", [])).toBe("Experienced professional.");
  });
});
