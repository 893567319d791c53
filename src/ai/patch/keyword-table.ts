/**
 * Keyword Table
 *
 * Static mapping from service name to the words that identify it, plus the
 * words that disqualify it (known false positives). Loaded from JSON.
 */

import fs from "fs/promises";
import { z } from "zod";

export const ServiceKeywordsSchema = z.object({
  keywords: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string().min(1)).default([]),
});

export const KeywordTableSchema = z.object({
  services: z.record(z.string(), ServiceKeywordsSchema),
});

export type ServiceKeywords = z.infer<typeof ServiceKeywordsSchema>;
export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive match of a term at the start of a word, so "tournament"
 * also hits "tournaments" but "chat" does not hit "subchat".
 */
export function containsTerm(text: string, term: string): boolean {
  const pattern = new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}`);
  return pattern.test(text.toLowerCase());
}

/**
 * Services (from `knownServices`) whose keywords appear in the utterance and
 * whose exclusions do not. A known service without a table entry matches on
 * its own name.
 */
export function matchServices(
  utterance: string,
  knownServices: string[],
  table: KeywordTable
): string[] {
  return knownServices.filter((service) => {
    const entry = table.services[service];
    const keywords = entry && entry.keywords.length > 0 ? entry.keywords : [service];
    const exclude = entry ? entry.exclude : [];

    if (exclude.some((term) => containsTerm(utterance, term))) return false;
    return keywords.some((term) => containsTerm(utterance, term));
  });
}

export function parseKeywordTable(raw: unknown): KeywordTable {
  return KeywordTableSchema.parse(raw);
}

export async function loadKeywordTable(filePath: string): Promise<KeywordTable> {
  const content = await fs.readFile(filePath, "utf8");
  return parseKeywordTable(JSON.parse(content));
}
