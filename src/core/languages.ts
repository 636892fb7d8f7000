export type LanguageId = "py" | "cpp" | "java" | "rust" | "javascript";

export interface LanguageInfo {
  id: LanguageId;
  /** Name used in prompts and the UI. */
  displayName: string;
  /** Tokens that may appear after an opening ``` fence for this language. */
  fenceAliases: string[];
}

export const LANGUAGES: Record<LanguageId, LanguageInfo> = {
  py: { id: "py", displayName: "Python", fenceAliases: ["py", "python", "python3"] },
  cpp: { id: "cpp", displayName: "C++", fenceAliases: ["cpp", "c++", "cxx", "cc"] },
  java: { id: "java", displayName: "Java", fenceAliases: ["java"] },
  rust: { id: "rust", displayName: "Rust", fenceAliases: ["rust", "rs"] },
  javascript: { id: "javascript", displayName: "JavaScript", fenceAliases: ["javascript", "js", "node"] },
};

export const DEFAULT_LANGUAGE: LanguageId = "py";

export function isLanguageId(value: string): value is LanguageId {
  return Object.prototype.hasOwnProperty.call(LANGUAGES, value);
}

/**
 * Resolve a user-supplied language name (id, display name or fence alias).
 * Returns null when nothing matches.
 */
export function parseLanguage(text: string): LanguageId | null {
  const needle = text.trim().toLowerCase();
  if (!needle) { return null; }
  for (const info of Object.values(LANGUAGES)) {
    if (
      info.id === needle ||
      info.displayName.toLowerCase() === needle ||
      info.fenceAliases.includes(needle)
    ) {
      return info.id;
    }
  }
  return null;
}
