import * as fs from "fs/promises";
import * as path from "path";

/**
 * Context values used to populate prompt templates.
 */
export interface PromptContext {
  language?: string;
  minLines?: number;
  maxLines?: number;
  topic?: string;
}

const templateCache = new Map<string, string>();

const TEMPLATE_VARIABLES: Record<keyof PromptContext, string> = {
  language: "LANGUAGE",
  minLines: "MIN_LINES",
  maxLines: "MAX_LINES",
  topic: "TOPIC",
};

export function clearTemplateCache(): void {
  templateCache.clear();
}

/**
 * Read a markdown prompt template from <resourceRoot>/prompts and cache it.
 */
export async function loadPromptTemplate(resourceRoot: string, filename: string): Promise<string> {
  const filePath = path.join(resourceRoot, "prompts", filename);
  const cached = templateCache.get(filePath);
  if (cached) {
    return cached;
  }

  const template = await fs.readFile(filePath, "utf-8");
  templateCache.set(filePath, template);
  return template;
}

/**
 * Fill {{VARIABLE}} placeholders and remove unresolved XML-like blocks.
 */
export function buildPrompt(template: string, context: PromptContext): string {
  let output = template;

  for (const [key, variable] of Object.entries(TEMPLATE_VARIABLES) as [keyof PromptContext, string][]) {
    const value = context[key];
    if (value === undefined || String(value).trim() === "") {
      continue;
    }
    output = output.replaceAll(`{{${variable}}}`, String(value));
  }

  // Remove XML-like blocks that still contain unresolved placeholders.
  output = output.replace(
    /<([a-zA-Z_][\w-]*)(?:\s+[^>]*)?>[\s\S]*?\{\{[A-Z0-9_]+\}\}[\s\S]*?<\/\1>/g,
    "",
  );

  output = output.replace(/\{\{[A-Z0-9_]+\}\}/g, "");
  output = output.replace(/\n{3,}/g, "\n\n").trim();

  return output;
}
