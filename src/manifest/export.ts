import { stringify } from "yaml";

import { AudioItem, Audiobook, Chapter } from "../types";
import { sameStrings } from "../utils/strings";
import { formatDuration } from "../utils/time";
import { ManifestDocument, ManifestItem } from "./schema";

type ExportedChapter = {
  name: string;
  start: string;
  end?: string;
  url?: string;
};

type ExportedItem = {
  path: string;
  title?: string;
  sequence?: number;
  authors?: string[];
  description?: string;
  categories?: string[];
  explicit?: boolean;
  chapters?: ExportedChapter[];
};

type ExportedManifest = {
  authors?: string[];
  title?: string;
  slug?: string;
  description?: string;
  language?: string;
  categories?: string[];
  explicit?: boolean;
  cover?: string;
  items?: ExportedItem[];
};

const CHANNEL_KEYS = [
  "authors",
  "title",
  "slug",
  "description",
  "language",
  "categories",
  "explicit",
  "cover",
  "items",
] as const satisfies readonly (keyof ExportedManifest)[];

// `path` always leads.
const ITEM_KEYS = [
  "title",
  "sequence",
  "authors",
  "description",
  "categories",
  "explicit",
  "chapters",
] as const satisfies readonly (keyof Omit<ExportedItem, "path">)[];

/** Copies the defined values of `source` in key order, so output order never depends on insertion order. */
function inKeyOrder<T extends object>(source: T, keys: readonly (keyof T)[]): Partial<T> {
  const out: Partial<T> = {};
  for (const key of keys) {
    if (source[key] !== undefined) out[key] = source[key];
  }
  return out;
}

function formatPosition(ms: number): string {
  return formatDuration(ms, { millis: ms % 1000 !== 0 });
}

function exportChapter(chapter: Chapter): ExportedChapter {
  return {
    name: chapter.name,
    start: formatPosition(chapter.start),
    ...(chapter.end !== undefined ? { end: formatPosition(chapter.end) } : {}),
    ...(chapter.url ? { url: chapter.url } : {}),
  };
}

function exportItem(item: AudioItem, index: number, keepAuthors: boolean): ExportedItem {
  const fields: Omit<ExportedItem, "path"> = {
    title: item.title,
    sequence: index + 1,
    authors: keepAuthors ? [...item.authors] : undefined,
    description: item.description,
    categories: item.categories ? [...item.categories] : undefined,
    explicit: item.explicit,
    chapters: item.chapters.length > 0 ? item.chapters.map(exportChapter) : undefined,
  };
  return { path: item.path, ...inKeyOrder(fields, ITEM_KEYS) };
}

/**
 * Projects the audiobook onto the fields a manifest can set. Paths stay
 * relative to the root; sizes, durations and types are left out.
 */
function normalizeForExport(book: Audiobook): ExportedManifest {
  const keepAuthors = !book.items.every((item) => sameStrings(item.authors, book.authors));
  return inKeyOrder<ExportedManifest>(
    {
      authors: [...book.authors],
      title: book.title,
      slug: book.slug,
      description: book.description,
      language: book.language,
      categories: [...book.categories],
      explicit: book.explicit,
      cover: book.cover,
      items: book.items.map((item, index) => exportItem(item, index, keepAuthors)),
    },
    CHANNEL_KEYS
  );
}

function exportManifestItem(entry: ManifestItem): ExportedItem {
  const { path, chapters, ...fields } = entry;
  return {
    path,
    ...inKeyOrder<Omit<ExportedItem, "path">>(
      { ...fields, chapters: chapters?.map(exportChapter) },
      ITEM_KEYS
    ),
  };
}

/** A loaded manifest in the shape `dumpManifest` writes, positions back in `HH:MM:SS`. */
function exportManifestDocument(document: ManifestDocument): ExportedManifest {
  const { items, ...fields } = document;
  return inKeyOrder<ExportedManifest>({ ...fields, items: items?.map(exportManifestItem) }, CHANNEL_KEYS);
}

function dumpManifest(document: ExportedManifest): string {
  return stringify(document, { lineWidth: 0 });
}

export { dumpManifest, exportManifestDocument, normalizeForExport };
export type { ExportedChapter, ExportedItem, ExportedManifest };
