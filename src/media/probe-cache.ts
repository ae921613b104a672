import { spawnSync } from "node:child_process";
import { readFileSync, writeFileSync } from "node:fs";

import { ensureDataDirSync, ffprobePath, probeCachePath } from "../config";
import { FfprobeChapter, ProbeData } from "../types";

type CacheEntry = {
  mtimeMs: number;
  data: ProbeData | null;
  error?: string;
};

const probeCache = new Map<string, CacheEntry>();

let probeCacheLoaded = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") out[key] = entry;
    else if (typeof entry === "number") out[key] = String(entry);
  }
  return out;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function toChapters(value: unknown): FfprobeChapter[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((chapter) => ({
    start_time: optionalString(chapter.start_time),
    end_time: optionalString(chapter.end_time),
    tags: stringRecord(chapter.tags),
  }));
}

/**
 * Format-level tags win over stream-level ones; Ogg and Opus files keep their
 * comments on the audio stream.
 */
function toProbeData(parsed: unknown): ProbeData {
  const root = isRecord(parsed) ? parsed : {};
  const format = isRecord(root.format) ? root.format : {};
  const streams = Array.isArray(root.streams) ? root.streams.filter(isRecord) : [];
  const durationStr = optionalString(format.duration);
  const duration = durationStr ? Number.parseFloat(durationStr) : undefined;
  const tags: Record<string, string> = {};
  for (const stream of streams) {
    Object.assign(tags, stringRecord(stream.tags));
  }
  Object.assign(tags, stringRecord(format.tags));
  return {
    duration: duration !== undefined && Number.isFinite(duration) ? duration : undefined,
    tags,
    chapters: toChapters(root.chapters),
  };
}

function reviveProbeData(data: unknown): ProbeData | null {
  if (!isRecord(data)) return null;
  return {
    duration: typeof data.duration === "number" ? data.duration : undefined,
    tags: stringRecord(data.tags),
    chapters: toChapters(data.chapters),
  };
}

function reviveEntry(entry: unknown): [string, CacheEntry] | null {
  if (!isRecord(entry)) return null;
  if (typeof entry.file !== "string" || typeof entry.mtimeMs !== "number") return null;
  return [
    entry.file,
    {
      mtimeMs: entry.mtimeMs,
      data: reviveProbeData(entry.data),
      error: typeof entry.error === "string" ? entry.error : undefined,
    },
  ];
}

function ensureProbeCacheLoaded() {
  if (probeCacheLoaded) return;
  probeCacheLoaded = true;
  let content: string;
  try {
    content = readFileSync(probeCachePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      console.warn(`[probe] failed to read cache ${probeCachePath}: ${(err as Error).message}`);
    }
    return;
  }
  try {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) return;
    for (const entry of parsed) {
      const revived = reviveEntry(entry);
      if (revived) probeCache.set(revived[0], revived[1]);
    }
  } catch (err) {
    console.warn(`[probe] ignoring corrupt cache ${probeCachePath}: ${(err as Error).message}`);
  }
}

function persistProbeCache() {
  try {
    ensureDataDirSync();
    const payload = Array.from(probeCache.entries()).map(([file, value]) => ({
      file,
      mtimeMs: value.mtimeMs,
      data: value.data,
      error: value.error,
    }));
    writeFileSync(probeCachePath, JSON.stringify(payload));
  } catch (err) {
    console.warn(`[probe] failed to persist cache: ${(err as Error).message}`);
  }
}

function probeData(filePath: string, mtimeMs: number): ProbeData | null {
  ensureProbeCacheLoaded();

  const cached = probeCache.get(filePath);
  if (cached && cached.mtimeMs === mtimeMs) return cached.data;
  const result = spawnSync(
    ffprobePath,
    ["-v", "error", "-print_format", "json", "-show_format", "-show_streams", "-show_chapters", filePath],
    { encoding: "utf8" }
  );
  if (result.error || result.status !== 0) {
    const message = result.error ? result.error.message : result.stderr.trim() || `exit status ${result.status}`;
    console.warn(`[probe] ffprobe failed file="${filePath}": ${message}`);
    probeCache.set(filePath, { mtimeMs, data: null, error: message });
    persistProbeCache();
    return null;
  }
  try {
    const data = toProbeData(JSON.parse(result.stdout));
    probeCache.set(filePath, { mtimeMs, data });
    persistProbeCache();
    return data;
  } catch (err) {
    const message = (err as Error).message;
    console.warn(`[probe] unparseable ffprobe output file="${filePath}": ${message}`);
    probeCache.set(filePath, { mtimeMs, data: null, error: message });
    persistProbeCache();
    return null;
  }
}

function probeError(filePath: string): string | undefined {
  return probeCache.get(filePath)?.error;
}

export { probeData, probeError };
