import { LANGUAGES, type LanguageId } from "../core/languages";

interface FencedBlock {
  info: string;
  body: string;
}

const THINK_BLOCK = /<think>[\s\S]*?(?:<\/think>|$)/g;
const THINK_CLOSE = "</think>";
// An unterminated last fence runs to the end of the text.
const FENCE = /```([^\n`]*)\n([\s\S]*?)(?:\n?```|$)/g;

/**
 * Pull the code out of a model response.
 *
 * A fenced block is chosen for the language when the first token of its
 * opening line is one of the language's aliases; text inside a block is
 * never inspected. Without such a block the first block wins, and a
 * response with no fences at all is taken as code.
 */
export function extractCode(response: string, language: LanguageId): string {
  const text = stripReasoning(response).trim();
  const blocks = findFencedBlocks(text);
  if (blocks.length === 0) {
    return text;
  }

  const aliases = LANGUAGES[language].fenceAliases;
  const match = blocks.find((b) => aliases.includes(infoToken(b.info)));
  return (match ?? blocks[0]).body;
}

/** Drop reasoning, including a dangling close tag whose opener was cut. */
function stripReasoning(response: string): string {
  let text = response.replace(THINK_BLOCK, "");
  const close = text.indexOf(THINK_CLOSE);
  if (close >= 0) {
    text = text.slice(close + THINK_CLOSE.length);
  }
  return text;
}

function findFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const m of text.matchAll(FENCE)) {
    blocks.push({ info: m[1] ?? "", body: m[2] ?? "" });
  }
  return blocks;
}

function infoToken(info: string): string {
  return info.trim().split(/\s+/)[0]?.toLowerCase() ?? "";
}
