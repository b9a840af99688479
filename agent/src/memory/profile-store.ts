/**
 * Profile Store
 *
 * JSON file persistence for the user profile. Every save rewrites the whole
 * file through a temp file and a rename, so a crash never leaves half a
 * profile on disk. A corrupt file is backed up beside the original and the
 * session starts from an empty profile.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { describeError, PersistenceError } from "#errors.js";
import { createComponentLogger } from "#logging.js";
import { emptyProfile, PREFERENCE_CATEGORIES, type UserProfile } from "./types.js";

const log = createComponentLogger("memory");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string" && v.trim() !== "");
}

/**
 * Validate parsed JSON as a profile. Unknown keys are dropped, missing lists
 * become empty. Returns null when the top level is not an object.
 */
export function parseProfile(data: unknown): UserProfile | null {
  if (!isRecord(data)) return null;
  const profile = emptyProfile();
  if (typeof data.name === "string" && data.name.trim()) profile.name = data.name.trim();

  const prefs = isRecord(data.preferences) ? data.preferences : {};
  for (const category of PREFERENCE_CATEGORIES) {
    profile.preferences[category] = stringList(prefs[category]);
  }
  return profile;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class ProfileStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Load the profile. A missing file is an empty profile; an unreadable or
   * corrupt one is logged and also yields an empty profile.
   */
  async load(): Promise<UserProfile> {
    if (!await fileExists(this.filePath)) return emptyProfile();

    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      log.error("Profile unreadable, starting empty", new PersistenceError(this.filePath, describeError(err), { cause: err }));
      return emptyProfile();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      await this.backupCorrupt(describeError(err));
      return emptyProfile();
    }

    const profile = parseProfile(parsed);
    if (!profile) {
      await this.backupCorrupt("top-level value is not an object");
      return emptyProfile();
    }
    return profile;
  }

  /** Atomic full rewrite. Throws PersistenceError. */
  async save(profile: UserProfile): Promise<void> {
    const json = JSON.stringify(profile, null, 2);
    const tmpPath = `${this.filePath}.tmp_${Date.now()}`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, json, "utf-8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch(rmErr => {
        log.debug("Could not remove temp profile file", { tmpPath, error: describeError(rmErr) });
      });
      throw new PersistenceError(this.filePath, describeError(err), { cause: err });
    }
  }

  private async backupCorrupt(reason: string): Promise<void> {
    const backupPath = `${this.filePath}.corrupt_${Date.now()}`;
    log.error("Corrupt profile file, starting empty", new PersistenceError(this.filePath, reason), { backupPath });
    try {
      await fs.copyFile(this.filePath, backupPath);
    } catch (err) {
      log.warn("Could not back up corrupt profile", { backupPath, error: describeError(err) });
    }
  }
}
