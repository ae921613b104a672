import path from "node:path";

import { EmptySlugError } from "../errors";
import { AudioItem, Audiobook } from "../types";
import { debugLog } from "../utils/debug";
import { slugify } from "../utils/strings";
import { ManifestDocument, ManifestItem } from "./schema";

type MergeOptions = {
  /** Modification time of the manifest file, carried on the result. */
  modifiedAt?: Date;
  /** `init` writes a manifest precisely so that a missing slug can be filled in. */
  allowEmptySlug?: boolean;
};

function checkSlug(book: Audiobook, options: MergeOptions) {
  if (!book.slug && !options.allowEmptySlug) throw new EmptySlugError(book.title);
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function applyItemOverrides(item: AudioItem, entry: ManifestItem) {
  if (entry.title !== undefined) item.title = entry.title;
  if (entry.categories !== undefined) item.categories = [...entry.categories];
  if (entry.description !== undefined) item.description = entry.description;
  if (entry.chapters !== undefined) item.chapters = entry.chapters.map((chapter) => ({ ...chapter }));
  if (entry.sequence !== undefined) item.sequence = entry.sequence;
  if (entry.explicit !== undefined) item.explicit = entry.explicit;
}

function warnOnCollisions(items: AudioItem[], sortKey: (item: AudioItem) => number) {
  const byKey = new Map<number, AudioItem[]>();
  for (const item of items) {
    const key = sortKey(item);
    byKey.set(key, [...(byKey.get(key) ?? []), item]);
  }
  for (const [key, group] of byKey) {
    if (group.length < 2 || group.every((item) => item.sequence === undefined)) continue;
    console.warn(
      `[merge] sequence ${key} shared by ${group.map((item) => `"${item.path}"`).join(", ")}; ordering those by path`
    );
  }
}

/**
 * Overlays a validated manifest on the audiobook derived from the directory.
 * Without a manifest the derived audiobook is returned as is.
 */
function mergeManifest(derived: Audiobook, manifest: ManifestDocument | null, options: MergeOptions = {}): Audiobook {
  if (!manifest) {
    checkSlug(derived, options);
    return derived;
  }

  const result = structuredClone(derived);
  const itemsByPath = new Map(result.items.map((item) => [item.path, item]));

  if (manifest.title !== undefined && manifest.title !== derived.title && manifest.slug === undefined) {
    result.slug = slugify(manifest.title);
  }
  if (manifest.title !== undefined) result.title = manifest.title;
  if (manifest.authors !== undefined) result.authors = [...manifest.authors];
  if (manifest.categories !== undefined) result.categories = [...manifest.categories];
  if (manifest.description !== undefined) result.description = manifest.description;
  if (manifest.slug !== undefined) result.slug = manifest.slug;
  if (manifest.language !== undefined) result.language = manifest.language;
  if (manifest.explicit !== undefined) result.explicit = manifest.explicit;
  if (manifest.cover !== undefined) result.cover = manifest.cover;

  // Join key -> position of its first entry in the manifest's list.
  const listed = new Map<string, number>();
  (manifest.items ?? []).forEach((entry, index) => {
    const key = path.relative(derived.root, path.resolve(derived.root, entry.path));
    const item = itemsByPath.get(key);
    if (!item) {
      console.warn(`[merge] skipping manifest entry for unknown path="${entry.path}" root="${derived.root}"`);
      return;
    }
    if (listed.has(key)) {
      console.warn(`[merge] path="${entry.path}" is listed more than once; later fields win`);
    } else {
      listed.set(key, index);
    }
    applyItemOverrides(item, entry);
  });

  const complete = listed.size === itemsByPath.size;
  const fallbackOrder = complete ? Array.from(listed.keys()) : Array.from(itemsByPath.keys()).sort(comparePaths);
  debugLog(`[merge] fallback order by ${complete ? "manifest list" : "path"} root="${derived.root}"`);
  const fallback = new Map(fallbackOrder.map((key, index) => [key, index + 1]));
  const sortKey = (item: AudioItem) => item.sequence ?? fallback.get(item.path) ?? fallback.size + 1;

  warnOnCollisions(result.items, sortKey);
  result.items.sort((a, b) => sortKey(a) - sortKey(b) || comparePaths(a.path, b.path));
  result.items.forEach((item, index) => {
    item.sequence = index + 1;
  });

  if (options.modifiedAt) result.manifestModifiedAt = options.modifiedAt;
  checkSlug(result, options);
  console.log(`[merge] merged manifest root="${derived.root}" slug="${result.slug}" listed=${listed.size}/${itemsByPath.size}`);
  return result;
}

export { mergeManifest };
export type { MergeOptions };
