import { DurationFormatError } from "../errors";
import { ChapterTag, FfprobeChapter } from "../types";
import { cleanMetaValue } from "../utils/strings";
import { parseDuration, secondsToMs } from "../utils/time";

const MAX_TAG_CHAPTERS = 1000;

function tagKey(index: number, suffix = ""): string {
  return `CHAPTER${String(index).padStart(3, "0")}${suffix}`;
}

/**
 * Reads the `CHAPTERnnn` / `CHAPTERnnnNAME` / `CHAPTERnnnURL` comment
 * convention. Numbering may start at 0 or 1; the run ends at the first index
 * missing a start or a name. Expects upper-cased keys.
 */
function chaptersFromTags(tags: Record<string, string>): ChapterTag[] {
  const first = tags[tagKey(0)] !== undefined ? 0 : tags[tagKey(1)] !== undefined ? 1 : null;
  if (first === null) return [];

  const chapters: ChapterTag[] = [];
  for (let index = first; index < MAX_TAG_CHAPTERS; index += 1) {
    const rawStart = tags[tagKey(index)];
    const name = cleanMetaValue(tags[tagKey(index, "NAME")]);
    if (!rawStart || !name) break;
    let start: number;
    try {
      start = parseDuration(rawStart);
    } catch (err) {
      if (!(err instanceof DurationFormatError)) throw err;
      console.warn(`[tags] stopping chapter run at ${tagKey(index)}: ${err.message}`);
      break;
    }
    const url = cleanMetaValue(tags[tagKey(index, "URL")]);
    chapters.push(url ? { name, start, url } : { name, start });
  }
  return chapters;
}

function chaptersFromProbe(chapters: FfprobeChapter[]): ChapterTag[] {
  return chapters.map((chap, index) => {
    const start = secondsToMs(chap.start_time) ?? 0;
    const end = secondsToMs(chap.end_time);
    const tagTitle = chap.tags?.title ?? chap.tags?.TITLE ?? chap.tags?.name ?? chap.tags?.NAME;
    const name = cleanMetaValue(tagTitle) ?? `Chapter ${index + 1}`;
    return end !== undefined && end >= start ? { name, start, end } : { name, start };
  });
}

export { chaptersFromProbe, chaptersFromTags };
