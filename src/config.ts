import { mkdirSync } from "node:fs";
import path from "node:path";

const APP_NAME = "shelfcast";
const APP_VERSION = "0.1.0";
const GENERATOR = `${APP_NAME}/${APP_VERSION}`;

const MANIFEST_FILENAME = `${APP_NAME}.yaml`;

const RSS_VERSION = "2.0";
const PSC_VERSION = "1.2";
const ITUNES_NAMESPACE = "http://www.itunes.com/dtds/podcast-1.0.dtd";
const PSC_NAMESPACE = "http://podlove.org/simple-chapters";
const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";
const FEED_CONTENT_TYPE = 'application/rss+xml; charset="utf-8"';

// Minutes.
const FEED_TTL = 60 * 24 * 365;

const UNKNOWN_AUTHOR = "Unknown author";
const UNKNOWN_TITLE = "Unknown title";

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[config] ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

const port = intFromEnv("PORT", 8000);
const rescanDelayMs = intFromEnv("RESCAN_DELAY_MS", 500);
const ffprobePath = process.env.FFPROBE_PATH ?? "ffprobe";
const dataDir = process.env.DATA_DIR ?? path.join(process.env.TMPDIR ?? "/tmp", APP_NAME);
const probeCachePath = path.join(dataDir, "probe-cache.json");

function ensureDataDirSync() {
  mkdirSync(dataDir, { recursive: true });
}

export {
  ATOM_NAMESPACE,
  FEED_CONTENT_TYPE,
  FEED_TTL,
  GENERATOR,
  ITUNES_NAMESPACE,
  MANIFEST_FILENAME,
  PSC_NAMESPACE,
  PSC_VERSION,
  RSS_VERSION,
  UNKNOWN_AUTHOR,
  UNKNOWN_TITLE,
  ensureDataDirSync,
  ffprobePath,
  port,
  probeCachePath,
  rescanDelayMs,
};
