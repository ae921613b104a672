import { LanguageCodeError } from "../errors";

function slugify(value: string): string {
  return value
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'");
}

function cleanMetaValue(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const lowered = trimmed.toLowerCase();
  if (lowered === "unknown" || lowered === "no description") return undefined;
  return trimmed;
}

function htmlToPlainText(html: string | undefined): string | undefined {
  if (!html) return undefined;
  const withBreaks = html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n\n")
    .replace(/<\/li>/gi, "\n")
    .replace(/<li>/gi, "- ");
  const withoutTags = withBreaks.replace(/<[^>]+>/g, "");
  const normalized = decodeXmlEntities(withoutTags)
    .replace(/\r/g, "")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .trim();
  return normalized || undefined;
}

/** Splits a multi-valued tag (ffprobe joins repeated comments with ";"). */
function splitTagValues(value: string | undefined): string[] {
  if (!value) return [];
  return uniqueStrings(value.split(";").map((part) => cleanMetaValue(part) ?? ""));
}

/** Drops empty strings and repeats, keeping first-seen order. */
function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return Array.from(seen);
}

function sameStrings(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

// RFC 1766: primary tag of 1-8 letters, then subtags of 1-8 letters or digits.
const LANG_CODE_PATTERN = /^[A-Za-z]{1,8}(-[A-Za-z0-9]{1,8})*$/;

function validateLangCode(value: string): boolean {
  return LANG_CODE_PATTERN.test(value);
}

function assertLangCode(value: string): string {
  if (!validateLangCode(value)) throw new LanguageCodeError(value);
  return value;
}

export {
  assertLangCode,
  cleanMetaValue,
  htmlToPlainText,
  sameStrings,
  slugify,
  splitTagValues,
  uniqueStrings,
  validateLangCode,
};
