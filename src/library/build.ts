import { promises as fs } from "node:fs";
import path from "node:path";

import { UNKNOWN_AUTHOR, UNKNOWN_TITLE } from "../config";
import { NoAudioFilesError, TagExtractionError } from "../errors";
import { extractTags as probeTags, mimeFromExt } from "../media/metadata";
import { AudioItem, Audiobook, ScanResults, TagExtractor } from "../types";
import { debugLog } from "../utils/debug";
import { slugify, uniqueStrings } from "../utils/strings";

type BuildOptions = {
  /** Files to leave out; compared by real path. */
  ignore?: Iterable<string>;
  extractTags?: TagExtractor;
};

async function realPath(filePath: string): Promise<string> {
  return fs.realpath(filePath).catch(() => path.resolve(filePath));
}

async function resolveIgnoreSet(ignore: Iterable<string> | undefined): Promise<Set<string>> {
  const resolved = await Promise.all(Array.from(ignore ?? [], (entry) => realPath(entry)));
  return new Set(resolved);
}

function isFileError(err: unknown): err is Error {
  return err instanceof TagExtractionError || (err instanceof Error && "errno" in err);
}

function categoriesKey(categories: readonly string[] | undefined): string {
  return JSON.stringify([...(categories ?? [])].sort());
}

/** True when every item has the value and all values agree. */
function sharedByAll<T>(items: AudioItem[], pick: (item: AudioItem) => T | undefined, key: (value: T) => string): boolean {
  const keys = new Set<string>();
  for (const item of items) {
    const value = pick(item);
    if (value === undefined) return false;
    keys.add(key(value));
  }
  return keys.size === 1;
}

function collapseItems(items: AudioItem[]): AudioItem[] {
  const collapseCategories = sharedByAll(items, (item) => item.categories, categoriesKey);
  const collapseDescription = sharedByAll(items, (item) => item.description, (value) => value);
  const collapseExplicit = sharedByAll(items, (item) => item.explicit ?? false, String);
  return items.map((item) => {
    const { categories, description, explicit, ...rest } = item;
    return {
      ...rest,
      ...(categories && !collapseCategories ? { categories } : {}),
      ...(description && !collapseDescription ? { description } : {}),
      ...(explicit !== undefined && !collapseExplicit ? { explicit } : {}),
    };
  });
}

async function buildItem(root: string, relativePath: string, extractTags: TagExtractor): Promise<{ item: AudioItem; album?: string }> {
  const fullPath = path.join(root, relativePath);
  const stat = await fs.stat(fullPath);
  const tags = await extractTags(fullPath);
  const authors = uniqueStrings(tags.artists);
  const categories = uniqueStrings(tags.categories).sort();
  const item: AudioItem = {
    path: relativePath,
    title: tags.title?.trim() || path.basename(relativePath, path.extname(relativePath)),
    authors: authors.length > 0 ? authors : [UNKNOWN_AUTHOR],
    durationMs: Math.max(0, Math.round(tags.durationMs || 0)),
    size: stat.size,
    mimetype: mimeFromExt(path.extname(relativePath)),
    chapters: tags.chapters.map((chapter) => ({ ...chapter })),
    ...(categories.length > 0 ? { categories } : {}),
    ...(tags.description ? { description: tags.description } : {}),
    ...(tags.explicit !== undefined ? { explicit: tags.explicit } : {}),
  };
  return { item, album: tags.album?.trim() || undefined };
}

/**
 * Derives the audiobook a directory describes on its own: one item per audio
 * file, channel fields aggregated over every item.
 */
async function buildAudiobook(root: string, scanResults: ScanResults, options: BuildOptions = {}): Promise<Audiobook> {
  const started = Date.now();
  const extractTags = options.extractTags ?? probeTags;
  const ignored = await resolveIgnoreSet(options.ignore);

  const items: AudioItem[] = [];
  const albums: string[] = [];
  for (const relativePath of scanResults.audio ?? []) {
    const fullPath = path.join(root, relativePath);
    if (ignored.size > 0 && ignored.has(await realPath(fullPath))) {
      debugLog(`[build] ignoring path="${relativePath}"`);
      continue;
    }
    try {
      const { item, album } = await buildItem(root, relativePath, extractTags);
      items.push(item);
      if (album) albums.push(album);
    } catch (err) {
      if (!isFileError(err)) throw err;
      console.warn(`[build] skipping path="${relativePath}": ${err.message}`);
    }
  }

  if (items.length === 0) throw new NoAudioFilesError(root);

  const distinctAlbums = uniqueStrings(albums);
  if (distinctAlbums.length > 1) {
    console.warn(`[build] multiple album titles found, using the first: ${distinctAlbums.map((a) => `"${a}"`).join(", ")}`);
  }
  const descriptions = uniqueStrings(items.flatMap((item) => (item.description ? [item.description] : [])));
  if (descriptions.length > 1) {
    console.warn(`[build] multiple descriptions found, using the first one root="${root}"`);
  }

  const title = distinctAlbums[0] ?? UNKNOWN_TITLE;
  const artwork = uniqueStrings([...(scanResults.cover ?? []), ...(scanResults.fanart ?? []), ...(scanResults.image ?? [])]);
  const book: Audiobook = {
    root,
    title,
    authors: uniqueStrings(items.flatMap((item) => item.authors)),
    slug: slugify(title),
    categories: uniqueStrings(items.flatMap((item) => item.categories ?? [])).sort(),
    items: collapseItems(items),
    ...(descriptions[0] ? { description: descriptions[0] } : {}),
    ...(items.some((item) => item.explicit) ? { explicit: true } : {}),
    ...(scanResults.cover?.[0] ? { cover: scanResults.cover[0] } : {}),
    ...(scanResults.fanart?.[0] ? { fanart: scanResults.fanart[0] } : {}),
    ...(artwork.length > 0 ? { artwork } : {}),
  };
  console.log(
    `[build] built audiobook root="${root}" slug="${book.slug}" items=${book.items.length} in ${Date.now() - started}ms`
  );
  return book;
}

export { buildAudiobook, collapseItems };
export type { BuildOptions };
