import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import {
  PromptTemplate,
  REQUIRED_PLACEHOLDERS,
  assertPlaceholders,
} from "@support-rag/shared";

/**
 * Load an operator-supplied system prompt. The file must parse and must
 * declare every required placeholder.
 */
export async function loadPromptTemplate(path: string): Promise<PromptTemplate> {
  const source = await readFile(path, "utf8");
  const template = new PromptTemplate(basename(path), source);
  assertPlaceholders(template, REQUIRED_PLACEHOLDERS);
  return template;
}
