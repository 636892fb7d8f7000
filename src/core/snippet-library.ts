import * as fs from "fs/promises";
import * as path from "path";
import { DEFAULT_LANGUAGE, isLanguageId, type LanguageId } from "./languages";

/**
 * Snippet Library
 *
 * Built-in fallback code, one file per language under
 * <resourceRoot>/samples/<language>.txt. Files are read on first use
 * and cached.
 */
export class SnippetLibrary {
  private readonly _cache = new Map<LanguageId, string>();

  constructor(private readonly _resourceRoot: string) {}

  /** Unknown ids get the default language's snippet. */
  async getSnippet(language: string): Promise<string> {
    const id = isLanguageId(language) ? language : DEFAULT_LANGUAGE;
    const cached = this._cache.get(id);
    if (cached !== undefined) {
      return cached;
    }

    const snippet = await fs.readFile(this.snippetPath(id), "utf-8");
    this._cache.set(id, snippet);
    return snippet;
  }

  snippetPath(language: LanguageId): string {
    return path.join(this._resourceRoot, "samples", `${language}.txt`);
  }
}
