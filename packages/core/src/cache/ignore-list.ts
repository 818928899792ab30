// packages/core/src/cache/ignore-list.ts
import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";
import { AlreadyIgnoredError, IgnoreListError } from "../errors.js";
import { canonicalize } from "../matching/path-matcher.js";

/**
 * Repositories the user asked gitfleet to forget, one canonical path per
 * line. Entries are only ever appended.
 */
export class IgnoreList {
  readonly ignoreFile: string;

  constructor(ignoreFile: string) {
    this.ignoreFile = ignoreFile;
  }

  private async readContent(): Promise<string> {
    try {
      return await readFile(this.ignoreFile, "utf-8");
    } catch (error) {
      if (
        error instanceof Error &&
        "code" in error &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
      ) {
        return "";
      }
      throw error;
    }
  }

  async load(): Promise<string[]> {
    return parseEntries(await this.readContent());
  }

  /**
   * Add a path to the list in canonical form.
   * @returns the canonical path that was stored
   */
  async add(path: string): Promise<string> {
    const canonical = canonicalize(path);
    const content = await this.readContent();
    if (parseEntries(content).includes(canonical)) {
      throw new AlreadyIgnoredError(canonical);
    }

    // Hand-edited files may lack a final newline
    const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
    try {
      await mkdir(dirname(this.ignoreFile), { recursive: true });
      await appendFile(this.ignoreFile, `${separator}${canonical}\n`, "utf-8");
    } catch (error) {
      throw new IgnoreListError(this.ignoreFile, error);
    }
    return canonical;
  }
}

function parseEntries(content: string): string[] {
  const entries: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const entry = line.trim();
    if (entry.length > 0 && !entries.includes(entry)) {
      entries.push(entry);
    }
  }
  return entries;
}
