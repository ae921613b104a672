import { promises as fs } from "node:fs";

import { DurationFormatError, LabelFileError, ManifestNotFoundError, UsageError } from "../errors";
import { parseDuration } from "../utils/time";
import { dumpManifest, exportManifestDocument } from "./export";
import { loadManifest, manifestPath } from "./index";
import { ManifestChapter, ManifestDocument } from "./schema";

type LabelImportOptions = {
  /** Drop the label end positions and keep only where each chapter starts. */
  ignoreEnd?: boolean;
};

function labelPosition(value: string, source: string, line: number): number {
  try {
    return parseDuration(value);
  } catch (err) {
    if (!(err instanceof DurationFormatError)) throw err;
    throw new LabelFileError(source, line, err.message, { cause: err });
  }
}

/**
 * Reads an Audacity label export: one `start<TAB>end<TAB>name` line per
 * label, positions in seconds. Spectral-selection lines (starting with `\`)
 * and blank lines are skipped; a point label (start equal to end) gets no end.
 */
function parseAudacityLabels(text: string, source: string, options: LabelImportOptions = {}): ManifestChapter[] {
  const chapters: ManifestChapter[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    if (!raw.trim() || raw.startsWith("\\")) return;
    const [start, end, ...name] = raw.split("\t");
    if (end === undefined) throw new LabelFileError(source, line, "expected start, end and name separated by tabs");
    const startMs = labelPosition(start, source, line);
    const endMs = options.ignoreEnd ? undefined : labelPosition(end, source, line);
    chapters.push({
      name: name.join("\t").trim(),
      start: startMs,
      ...(endMs !== undefined && endMs !== startMs ? { end: endMs } : {}),
    });
  });
  return chapters;
}

/** Appends chapters to the manifest's `index`-th item (1-based, in list order). */
function addChapters(document: ManifestDocument, index: number, chapters: ManifestChapter[]): ManifestDocument {
  const items = document.items ?? [];
  if (!Number.isInteger(index) || index < 1 || index > items.length) {
    throw new UsageError(`item ${index} does not exist; the manifest lists ${items.length} item(s)`);
  }
  return {
    ...document,
    items: items.map((entry, position) =>
      position === index - 1 ? { ...entry, chapters: [...(entry.chapters ?? []), ...chapters] } : entry
    ),
  };
}

async function importChapters(root: string, labelFile: string, index: number, options: LabelImportOptions = {}) {
  const loaded = await loadManifest(root);
  if (!loaded) throw new ManifestNotFoundError(manifestPath(root));
  const chapters = parseAudacityLabels(await fs.readFile(labelFile, "utf8"), labelFile, options);
  const updated = addChapters(loaded.document, index, chapters);
  await fs.writeFile(loaded.path, dumpManifest(exportManifestDocument(updated)), "utf8");
  console.log(`[chapters] added ${chapters.length} chapter(s) to item ${index} path="${loaded.path}"`);
  return updated;
}

export { addChapters, importChapters, parseAudacityLabels };
export type { LabelImportOptions };
