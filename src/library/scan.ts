import { constants, promises as fs } from "node:fs";
import path from "node:path";

import { ScanError } from "../errors";
import { Classifier, ScanLabel, ScanResults } from "../types";

const AUDIO_EXTENSIONS = ["m4a", "m4b", "mp3", "ogg", "oga", "opus", "flac"];
const IMAGE_EXTENSIONS = ["jpeg", "jpg", "png"];
const COVER_NAMES = ["cover", "folder", "cover_art", "cover-art", "coverart"];
const FANART_NAMES = ["fanart", "fan_art", "fan-art"];

type MatcherOptions = {
  names?: readonly string[];
  extensions?: readonly string[];
};

/** Matches on lower-cased stem and extension; an omitted list matches anything. */
function makeFilenameMatcher({ names, extensions }: MatcherOptions): Classifier {
  const nameSet = names ? new Set(names.map((n) => n.toLowerCase())) : null;
  const extSet = extensions ? new Set(extensions.map((e) => `.${e.toLowerCase()}`)) : null;
  return (filePath: string) => {
    const ext = path.extname(filePath).toLowerCase();
    const stem = path.basename(filePath, path.extname(filePath)).toLowerCase();
    return (!extSet || extSet.has(ext)) && (!nameSet || nameSet.has(stem));
  };
}

const audioMatcher = makeFilenameMatcher({ extensions: AUDIO_EXTENSIONS });
const imageMatcher = makeFilenameMatcher({ extensions: IMAGE_EXTENSIONS });
const coverMatcher = makeFilenameMatcher({ names: COVER_NAMES, extensions: IMAGE_EXTENSIONS });
const fanartMatcher = makeFilenameMatcher({ names: FANART_NAMES, extensions: IMAGE_EXTENSIONS });

const defaultClassifiers: Record<ScanLabel, Classifier> = {
  audio: audioMatcher,
  cover: coverMatcher,
  fanart: fanartMatcher,
  image: imageMatcher,
};

async function readDirOrFail(dir: string) {
  try {
    return await fs.readdir(dir);
  } catch (err) {
    throw new ScanError(dir, { cause: err });
  }
}

async function isReadable(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

async function walk<L extends string>(
  root: string,
  dir: string,
  classifiers: Record<L, Classifier>,
  labels: L[],
  results: Partial<Record<L, string[]>>
): Promise<void> {
  const names = await readDirOrFail(dir);
  names.sort();
  for (const name of names) {
    const fullPath = path.join(dir, name);
    // stat (not lstat): symlinked files and directories are followed.
    const stat = await fs.stat(fullPath).catch((err: NodeJS.ErrnoException) => {
      console.warn(`[scan] skipping unreadable entry path="${fullPath}": ${err.message}`);
      return null;
    });
    if (!stat) continue;
    if (stat.isDirectory()) {
      await walk(root, fullPath, classifiers, labels, results);
      continue;
    }
    if (!stat.isFile()) continue;
    const matched = labels.filter((label) => classifiers[label](fullPath));
    if (matched.length === 0) continue;
    if (!(await isReadable(fullPath))) {
      console.warn(`[scan] skipping unreadable file path="${fullPath}"`);
      continue;
    }
    const relative = path.relative(root, fullPath);
    for (const label of matched) (results[label] ??= []).push(relative);
  }
}

/**
 * Labels every file below `root` with each classifier it satisfies. Paths are
 * relative to `root` and sorted per label; labels nothing matched are absent.
 */
async function scan<L extends string>(
  root: string,
  classifiers: Record<L, Classifier>
): Promise<Partial<Record<L, string[]>>> {
  const started = Date.now();
  const labels = Object.keys(classifiers).filter((key): key is L => key in classifiers);
  const results: Partial<Record<L, string[]>> = {};
  await walk(root, root, classifiers, labels, results);
  for (const label of labels) results[label]?.sort();
  console.log(
    `[scan] done root="${root}" ${labels.map((label) => `${label}=${results[label]?.length ?? 0}`).join(" ")} in ${Date.now() - started}ms`
  );
  return results;
}

function scanAudiobookDir(root: string): Promise<ScanResults> {
  return scan(root, defaultClassifiers);
}

export {
  coverMatcher,
  makeFilenameMatcher,
  scan,
  scanAudiobookDir,
};
