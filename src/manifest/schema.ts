import path from "node:path";
import { z } from "zod";

import { DurationFormatError } from "../errors";
import { validateLangCode } from "../utils/strings";
import { parseDuration } from "../utils/time";

/** A position as `H:MM:SS(.fff)`, `MM:SS`, `SS` or a number of seconds; parsed to milliseconds. */
const duration = z.union([z.string(), z.number().nonnegative()]).transform((value, ctx) => {
  if (typeof value === "number") return Math.round(value * 1000);
  try {
    return parseDuration(value);
  } catch (err) {
    if (!(err instanceof DurationFormatError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    return z.NEVER;
  }
});

const nonEmptyString = z.string().refine((value) => value.trim().length > 0, { message: "must be a non-empty string" });

function staysInRoot(value: string): boolean {
  if (path.isAbsolute(value) || path.win32.isAbsolute(value)) return false;
  const normalized = path.normalize(value);
  return normalized !== ".." && !normalized.startsWith(`..${path.sep}`);
}

/** A path below the audiobook root. */
const rootRelativePath = nonEmptyString.refine(staysInRoot, { message: "must be a relative path inside the audiobook directory" });

const chapterSchema = z
  .object({
    name: z.string(),
    start: duration,
    end: duration.optional(),
    url: z.string().optional(),
  })
  .strict();

const itemSchema = z
  .object({
    path: rootRelativePath,
    title: z.string().optional(),
    sequence: z.number().int().optional(),
    authors: z.array(z.string()).optional(),
    description: z.string().optional(),
    categories: z.array(z.string()).optional(),
    explicit: z.boolean().optional(),
    chapters: z.array(chapterSchema).optional(),
  })
  .strict();

const manifestSchema = z
  .object({
    authors: z.array(z.string()).optional(),
    title: z.string().optional(),
    slug: z.string().optional(),
    description: z.string().optional(),
    language: z.string().refine(validateLangCode, { message: "must be a language tag such as en or en-US" }).optional(),
    categories: z.array(z.string()).optional(),
    explicit: z.boolean().optional(),
    cover: rootRelativePath.optional(),
    items: z.array(itemSchema).optional(),
  })
  .strict();

type ManifestChapter = z.output<typeof chapterSchema>;
type ManifestItem = z.output<typeof itemSchema>;
type ManifestDocument = z.output<typeof manifestSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(document)";
  return `${where}: ${issue.message}`;
}

export { formatIssue, manifestSchema };
export type { ManifestChapter, ManifestDocument, ManifestItem };
