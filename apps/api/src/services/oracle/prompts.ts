/**
 * Prompt Templates
 *
 * Templates live in apps/api/prompts/*.md and are read once per process.
 * `{review_text}` is replaced with the review being scored.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

export type PromptName = "classify_review" | "quantify_review";

const PROMPT_DIR = fileURLToPath(new URL("../../../prompts/", import.meta.url));

const cache = new Map<PromptName, Promise<string>>();

export function loadPromptTemplate(name: PromptName): Promise<string> {
  let template = cache.get(name);
  if (!template) {
    template = readFile(`${PROMPT_DIR}${name}.md`, "utf-8");
    cache.set(name, template);
    // Let a failed read be retried on the next call
    void template.catch(() => {
      cache.delete(name);
    });
  }
  return template;
}

export async function buildPrompt(name: PromptName, reviewText: string): Promise<string> {
  const template = await loadPromptTemplate(name);
  return template.replaceAll("{review_text}", reviewText);
}
