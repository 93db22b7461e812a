import fs from "fs-extra";
import path from "path";
import type { CanonicalProfile } from "../schemas/profile-schemas";
import { ProfileFormatError, ProfileNotFoundError } from "../utils/errors";
import { isJsonObject, type JsonObject } from "../utils/json-extraction";
import logger, { describeError } from "../utils/logger";
import { convertLegacyProfile, decodeProfile } from "./schema-migrator";

/**
 * Persists the canonical profile document at a fixed path.
 * Legacy documents are migrated on load and written back in canonical form.
 */
export class ProfileStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    return fs.pathExists(this.filePath);
  }

  /**
   * Loads the profile. Legacy and mixed documents are migrated and re-saved
   * first; canonical documents with null or mistyped fields are coerced in
   * memory.
   *
   * @returns The canonical profile.
   * @throws ProfileNotFoundError if the file does not exist.
   * @throws ProfileFormatError if the file is not JSON, or has no identity.
   */
  async load(): Promise<CanonicalProfile> {
    const raw = await this.readDocument();
    const decoded = decodeProfile(raw);

    switch (decoded.kind) {
      case "canonical":
        return decoded.profile;
      case "repaired":
        logger.warn("Coerced mistyped profile fields to canonical defaults", {
          path: this.filePath,
          issues: decoded.issues,
        });
        return decoded.profile;
      case "unrecognized":
        throw new ProfileFormatError(
          `Profile at ${this.filePath} does not match any known schema`,
          decoded.issues,
        );
      case "mixed":
        await this.save(decoded.profile);
        logger.info("Merged legacy fields into canonical profile", {
          dialects: decoded.dialects,
          path: this.filePath,
        });
        return decoded.profile;
      default: {
        const migrated = convertLegacyProfile(decoded.raw, decoded.kind);
        await this.save(migrated);
        logger.info("Migrated legacy profile to canonical schema", {
          dialect: decoded.kind,
          path: this.filePath,
        });
        return migrated;
      }
    }
  }

  /**
   * Writes the whole document to a sibling temp file, then renames it over
   * the target.
   */
  async save(document: CanonicalProfile): Promise<void> {
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`,
    );
    await fs.outputFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    await fs.rename(tempPath, this.filePath);
  }

  /**
   * Sets `memory_notes[jobTitle]` and persists the profile. Existing entries
   * for other titles are kept; the same title is overwritten.
   *
   * @returns The ledger after the write.
   */
  async recordAdaptationNote(
    jobTitle: string,
    note: string,
  ): Promise<Record<string, string>> {
    const profile = await this.load();
    const memoryNotes = { ...(profile.memory_notes ?? {}), [jobTitle]: note };
    await this.save({ ...profile, memory_notes: memoryNotes });
    logger.debug("Recorded adaptation note", { jobTitle });
    return memoryNotes;
  }

  /**
   * Helper method to read and parse the backing file.
   */
  private async readDocument(): Promise<JsonObject> {
    if (!(await fs.pathExists(this.filePath))) {
      throw new ProfileNotFoundError(this.filePath);
    }

    const content = await fs.readFile(this.filePath, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ProfileFormatError(
        `Profile at ${this.filePath} is not valid JSON`,
        [describeError(error)],
        { cause: error },
      );
    }

    if (!isJsonObject(parsed)) {
      throw new ProfileFormatError(
        `Profile at ${this.filePath} must be a JSON object`,
      );
    }
    return parsed;
  }
}
