import { getLogger } from "./logger.js";
import type { EntryType, IndexableEntry, SourceEntry } from "./types.js";

const log = getLogger("entries");

const TYPE_ALIASES: Record<string, EntryType> = {
  text_entry: "text_entry",
  text: "text_entry",
  heading: "heading",
  plain_text: "plain_text",
  attachment: "attachment_metadata",
  attachment_metadata: "attachment_metadata",
};

/** Entry types whose content is worth embedding. */
export const INDEXABLE_TYPES: ReadonlySet<EntryType> = new Set([
  "text_entry",
  "heading",
  "plain_text",
]);

/** Maps upstream spellings ("text entry", "Plain-Text") onto {@link EntryType}, or null. */
export function normalizeEntryType(raw: string): EntryType | null {
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return TYPE_ALIASES[key] ?? null;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
  ndash: "–",
  mdash: "—",
  hellip: "…",
  deg: "°",
  micro: "µ",
  plusmn: "±",
  times: "×",
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1] === "x" || body[1] === "X";
      const code = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isInteger(code) && code >= 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/** Rich-text HTML to plain text. Block ends become line breaks. */
export function htmlToText(html: string): string {
  const text = html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|tr|h[1-6]|blockquote|pre)>/gi, "\n")
    .replace(/<[^>]+>/g, "");

  return decodeEntities(text)
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export interface ExtractionResult {
  entries: IndexableEntry[];
  skipped: number;
}

/**
 * Keep the entries that carry indexable text, in their original order.
 * Unknown or non-text types and entries that are empty after cleaning are
 * counted as skipped.
 */
export function extractEntries(source: readonly SourceEntry[]): ExtractionResult {
  const entries: IndexableEntry[] = [];
  let skipped = 0;

  for (const entry of source) {
    const entryType = normalizeEntryType(entry.entryType);
    if (entryType === null || !INDEXABLE_TYPES.has(entryType)) {
      log.debug({ entryId: entry.entryId, entryType: entry.entryType }, "skipping entry type");
      skipped++;
      continue;
    }
    const text = entryType === "text_entry" ? htmlToText(entry.content) : entry.content.trim();
    if (text === "") {
      skipped++;
      continue;
    }
    entries.push({ entryId: entry.entryId, entryType, text, source: entry });
  }

  return { entries, skipped };
}
