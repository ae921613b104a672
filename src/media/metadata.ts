import { promises as fs } from "node:fs";
import path from "node:path";

import { TagExtractionError } from "../errors";
import { chaptersFromProbe, chaptersFromTags } from "../library/chapters";
import { ProbeData, TagRecord } from "../types";
import { cleanMetaValue, htmlToPlainText, splitTagValues } from "../utils/strings";
import { secondsToMs } from "../utils/time";
import { probeData, probeError } from "./probe-cache";

const AUDIO_MIME_TYPES: Readonly<Record<string, string>> = Object.freeze({
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".m4b": "audio/x-m4b",
  ".mp4": "audio/mp4",
  ".ogg": "audio/ogg",
  ".oga": "audio/ogg",
  ".opus": "audio/opus",
  ".flac": "audio/flac",
});

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = Object.freeze({
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
});

function mimeFromExt(ext: string): string {
  return AUDIO_MIME_TYPES[ext.toLowerCase()] ?? "application/octet-stream";
}

function imageMimeFromPath(filePath: string): string {
  return IMAGE_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/** Tag lookups are case-insensitive; ffprobe keeps whatever case the file uses. */
function upperKeys(tags: Record<string, string> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags ?? {})) {
    const upper = key.toUpperCase();
    if (!(upper in out)) out[upper] = value;
  }
  return out;
}

function parseExplicit(tags: Record<string, string>): boolean | undefined {
  const advisory = tags.ITUNESADVISORY ?? tags.EXPLICIT;
  if (advisory === undefined) return undefined;
  const lowered = advisory.trim().toLowerCase();
  if (["1", "yes", "true", "explicit"].includes(lowered)) return true;
  if (["0", "2", "no", "false", "clean"].includes(lowered)) return false;
  return undefined;
}

function tagsFromProbe(probed: ProbeData): TagRecord {
  const tags = upperKeys(probed.tags);
  const description = htmlToPlainText(cleanMetaValue(tags.DESCRIPTION ?? tags.COMMENT));
  const probedChapters = chaptersFromProbe(probed.chapters ?? []);
  return {
    artists: splitTagValues(tags.ARTIST ?? tags.ALBUM_ARTIST),
    album: cleanMetaValue(tags.ALBUM),
    title: cleanMetaValue(tags.TITLE),
    categories: splitTagValues(tags.GENRE),
    description,
    explicit: parseExplicit(tags),
    durationMs: secondsToMs(probed.duration) ?? 0,
    chapters: probedChapters.length > 0 ? probedChapters : chaptersFromTags(tags),
  };
}

async function extractTags(filePath: string): Promise<TagRecord> {
  const stat = await fs.stat(filePath).catch((err: NodeJS.ErrnoException) => {
    throw new TagExtractionError(filePath, err.message, { cause: err });
  });
  const probed = probeData(filePath, stat.mtimeMs);
  if (!probed) throw new TagExtractionError(filePath, probeError(filePath) ?? "ffprobe failed");
  return tagsFromProbe(probed);
}

export { extensionOf, extractTags, imageMimeFromPath, mimeFromExt, tagsFromProbe };
