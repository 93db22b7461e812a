import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CanonicalProfile } from "../../schemas/profile-schemas";
import { ProfileFormatError, ProfileNotFoundError } from "../../utils/errors";
import { ProfileStore } from "../profile-store";

const profile: CanonicalProfile = {
  identity: { name: "Sam Lee", title: "Backend Engineer", email: "sam@example.com" },
  long_profile: "Backend engineer focused on payments.",
  experiences: [
    {
      company: "Initech",
      location: "Austin",
      role: "Engineer",
      dates: "2018-2022",
      missions: ["Built billing", "Ran on-call"],
    },
  ],
  skills: { technical: ["Go", "PostgreSQL"], methodological: ["TDD"] },
  education: [{ degree: "BSc Computer Science", school: "UT", dates: "2017" }],
  languages: ["English (native)", "Español (B2)"],
  interests: ["Chess"],
  memory_notes: {},
};

describe("ProfileStore", () => {
  let workDir: string;
  let profilePath: string;
  let store: ProfileStore;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "profile-store-"));
    profilePath = path.join(workDir, "profile_structure.json");
    store = new ProfileStore(profilePath);
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  it("round-trips a canonical document", async () => {
    await store.save(profile);
    await expect(store.load()).resolves.toEqual(profile);
  });

  it("writes indented UTF-8 JSON and leaves no temp file behind", async () => {
    await store.save(profile);
    const content = await fs.readFile(profilePath, "utf8");
    expect(content).toContain('  "identity": {');
    expect(content).toContain("Español (B2)");
    expect(await fs.readdir(workDir)).toEqual(["profile_structure.json"]);
  });

  it("throws ProfileNotFoundError naming the bootstrap step", async () => {
    expect(await store.exists()).toBe(false);
    const error = await store.load().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProfileNotFoundError);
    expect(error).toHaveProperty("statusCode", 404);
    expect(String(error)).toContain("npm run profile:prepare -- <resume.pdf>");
  });

  it("rejects files that are not JSON objects", async () => {
    await fs.writeFile(profilePath, "{ not json", "utf8");
    await expect(store.load()).rejects.toBeInstanceOf(ProfileFormatError);

    await fs.writeJson(profilePath, ["a", "b"]);
    await expect(store.load()).rejects.toThrow("must be a JSON object");
  });

  it("rejects documents of no known schema", async () => {
    await fs.writeJson(profilePath, { foo: "bar" });
    await expect(store.load()).rejects.toThrow(
      "does not match any known schema: identity: Required",
    );
  });

  it("migrates the legacy french document and rewrites it in canonical form", async () => {
    await fs.writeJson(profilePath, {
      identite: { nom: "Ana Dupont", titre: "Ingénieure" },
      profil_long: "...",
      experiences: [
        {
          entreprise: "Acme",
          lieu: "Lyon",
          poste: "Développeuse",
          dates: "2020-2024",
          missions: ["API"],
        },
      ],
      competences: { techniques: ["Python"], methodologiques: [] },
      formation: "...",
      langues: ["Français (natif)"],
    });

    const expected = {
      identity: { name: "Ana Dupont", title: "Ingénieure" },
      long_profile: "...",
      experiences: [
        {
          company: "Acme",
          location: "Lyon",
          role: "Développeuse",
          dates: "2020-2024",
          missions: ["API"],
        },
      ],
      skills: { technical: ["Python"], methodological: [] },
      education: "...",
      languages: ["Français (natif)"],
      interests: [],
      memory_notes: {},
    };

    await expect(store.load()).resolves.toEqual(expected);

    const onDisk = await fs.readJson(profilePath);
    expect(onDisk).toEqual(expected);
    expect(Object.keys(onDisk)).not.toContain("identite");
    await expect(store.load()).resolves.toEqual(expected);
  });

  it("migrates the legacy spanish document and rewrites it in canonical form", async () => {
    await fs.writeJson(profilePath, {
      identidad: { nombre: "Lucía Gómez", titulo: "Analista" },
      perfil_largo: "Analista de datos.",
      experiencias: [
        {
          empresa: "Datos SA",
          lugar: "Madrid",
          puesto: "Analista",
          fechas: "2020-2023",
          misiones: ["Informes"],
        },
      ],
      competencias: { tecnicas: ["R"], metodologicas: ["Kanban"] },
      formacion: "Grado en Estadística",
      idiomas: ["Español (nativo)"],
      intereses: ["Ajedrez"],
    });

    const expected = {
      identity: { name: "Lucía Gómez", title: "Analista" },
      long_profile: "Analista de datos.",
      experiences: [
        {
          company: "Datos SA",
          location: "Madrid",
          role: "Analista",
          dates: "2020-2023",
          missions: ["Informes"],
        },
      ],
      skills: { technical: ["R"], methodological: ["Kanban"] },
      education: "Grado en Estadística",
      languages: ["Español (nativo)"],
      interests: ["Ajedrez"],
      memory_notes: {},
    };

    await expect(store.load()).resolves.toEqual(expected);

    const onDisk = await fs.readJson(profilePath);
    expect(onDisk).toEqual(expected);
    expect(Object.keys(onDisk)).not.toContain("identidad");
    await expect(store.load()).resolves.toEqual(expected);
  });

  it("merges legacy fields found next to a canonical identity and drops their keys", async () => {
    await fs.writeJson(profilePath, {
      identity: { name: "Ana Dupont", title: "Ingénieure" },
      competences: { techniques: ["Python"], methodologiques: ["Scrum"] },
      profil_long: "Ingénieure data.",
    });

    const expected = {
      identity: { name: "Ana Dupont", title: "Ingénieure" },
      long_profile: "Ingénieure data.",
      experiences: [],
      skills: { technical: ["Python"], methodological: ["Scrum"] },
      education: "",
      languages: [],
      interests: [],
      memory_notes: {},
    };

    await expect(store.load()).resolves.toEqual(expected);
    expect(Object.keys(await fs.readJson(profilePath)).sort()).toEqual([
      "education",
      "experiences",
      "identity",
      "interests",
      "languages",
      "long_profile",
      "memory_notes",
      "skills",
    ]);

    await store.recordAdaptationNote("Data Engineer", "tailored");
    const onDisk = await fs.readJson(profilePath);
    expect(onDisk).toEqual({ ...expected, memory_notes: { "Data Engineer": "tailored" } });
  });

  it("coerces null fields of a canonical document instead of refusing it", async () => {
    const stored = {
      identity: { name: "Sam Lee", title: "Backend Engineer" },
      long_profile: null,
      experiences: [
        {
          company: "Initech",
          location: null,
          role: "Engineer",
          dates: "2018-2022",
          missions: ["Built billing"],
        },
      ],
      skills: { technical: ["Go"] },
      education: null,
      languages: ["English"],
    };
    await fs.writeJson(profilePath, stored);

    await expect(store.load()).resolves.toEqual({
      identity: { name: "Sam Lee", title: "Backend Engineer" },
      long_profile: "",
      experiences: [
        {
          company: "Initech",
          location: "",
          role: "Engineer",
          dates: "2018-2022",
          missions: ["Built billing"],
        },
      ],
      skills: { technical: ["Go"] },
      education: "",
      languages: ["English"],
    });
    expect(await fs.readJson(profilePath)).toEqual(stored);

    await expect(store.recordAdaptationNote("Data Engineer", "tailored")).resolves.toEqual({
      "Data Engineer": "tailored",
    });
    expect((await store.load()).memory_notes).toEqual({ "Data Engineer": "tailored" });
  });

  it("grows the note ledger and overwrites notes for the same title", async () => {
    await store.save(profile);

    await store.recordAdaptationNote("Data Engineer", "first");
    await store.recordAdaptationNote("Platform Engineer", "second");
    const ledger = await store.recordAdaptationNote("Data Engineer", "third");

    expect(ledger).toEqual({ "Data Engineer": "third", "Platform Engineer": "second" });
    const reloaded = await store.load();
    expect(reloaded.memory_notes).toEqual(ledger);
    expect(reloaded.identity).toEqual(profile.identity);
  });

  it("creates the ledger on profiles written without one", async () => {
    const { memory_notes: _unused, ...withoutNotes } = profile;
    await store.save(withoutNotes);
    await store.recordAdaptationNote("QA Lead", "Generated resume tailored for: QA Lead");
    const reloaded = await store.load();
    expect(reloaded.memory_notes).toEqual({
      "QA Lead": "Generated resume tailored for: QA Lead",
    });
  });
});
