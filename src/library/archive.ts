import { createReadStream, createWriteStream, promises as fs } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import JSZip from "jszip";

import { manifestPath } from "../manifest";
import { Audiobook } from "../types";
import { uniqueStrings } from "../utils/strings";

type ArchiveOptions = {
  /** Leave `shelfcast.yaml` out of the archive. */
  skipManifest?: boolean;
};

function entryName(book: Audiobook, relativePath: string): string {
  return [book.slug, ...relativePath.split(path.sep)].join("/");
}

async function manifestExists(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/**
 * Packs the audio files, the artwork and the manifest under a folder named
 * after the slug. File contents are streamed from disk when the zip is written.
 */
async function buildArchive(book: Audiobook, options: ArchiveOptions = {}): Promise<JSZip> {
  const zip = new JSZip();
  const artwork = uniqueStrings([...(book.cover ? [book.cover] : []), ...(book.fanart ? [book.fanart] : []), ...(book.artwork ?? [])]);
  for (const relativePath of [...book.items.map((item) => item.path), ...artwork]) {
    const fullPath = path.join(book.root, relativePath);
    // Missing files fail before the zip starts.
    await fs.access(fullPath);
    console.log(`[archive] adding path="${relativePath}"`);
    zip.file(entryName(book, relativePath), createReadStream(fullPath));
  }
  const manifest = manifestPath(book.root);
  if (!options.skipManifest && (await manifestExists(manifest))) {
    console.log(`[archive] adding manifest path="${manifest}"`);
    zip.file(entryName(book, path.basename(manifest)), createReadStream(manifest));
  }
  return zip;
}

async function writeArchive(book: Audiobook, output: string, options: ArchiveOptions = {}) {
  const started = Date.now();
  const zip = await buildArchive(book, options);
  await pipeline(
    zip.generateNodeStream({ type: "nodebuffer", streamFiles: true, compression: "DEFLATE" }),
    createWriteStream(output)
  );
  console.log(`[archive] wrote ${output} slug="${book.slug}" in ${Date.now() - started}ms`);
}

export { writeArchive };
export type { ArchiveOptions };
