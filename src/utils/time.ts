import { DurationFormatError } from "../errors";

const INTEGER = /^\d+$/;
const FRACTION = /^\.\d+$/;

function toInt(part: string, raw: string): number {
  if (!INTEGER.test(part)) throw new DurationFormatError(raw);
  return Number.parseInt(part, 10);
}

/**
 * Parses `H:MM:SS`, `MM:SS` or `SS`, each with an optional `.fff` fraction,
 * into milliseconds. Empty input is zero.
 */
function parseDuration(value: string | undefined | null): number {
  if (!value) return 0;
  const raw = value.trim();
  if (!raw) return 0;

  let main = raw;
  let ms = 0;
  const dot = raw.lastIndexOf(".");
  if (dot !== -1) {
    const fraction = raw.slice(dot);
    if (!FRACTION.test(fraction)) throw new DurationFormatError(raw);
    ms = Math.round(Number.parseFloat(`0${fraction}`) * 1000);
    main = raw.slice(0, dot);
  }

  const parts = main.split(":");
  let hours = 0;
  let minutes = 0;
  let seconds = 0;
  if (parts.length === 3) {
    [hours, minutes, seconds] = parts.map((part) => toInt(part, raw));
  } else if (parts.length === 2) {
    [minutes, seconds] = parts.map((part) => toInt(part, raw));
  } else if (parts.length === 1) {
    seconds = toInt(parts[0], raw);
  } else {
    throw new DurationFormatError(raw);
  }
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + ms;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatDuration(totalMs: number, options: { millis?: boolean } = {}): string {
  const clamped = Math.max(0, Math.round(totalMs));
  const ms = clamped % 1000;
  const totalSeconds = Math.floor(clamped / 1000);
  const seconds = totalSeconds % 60;
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600);
  const base = `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  return options.millis ? `${base}.${pad(ms, 3)}` : base;
}

/** Seconds (as ffprobe reports them) to whole milliseconds. */
function secondsToMs(seconds: number | string | undefined): number | undefined {
  if (seconds === undefined) return undefined;
  const value = typeof seconds === "number" ? seconds : Number.parseFloat(seconds);
  if (!Number.isFinite(value) || value < 0) return undefined;
  return Math.round(value * 1000);
}

export { formatDuration, parseDuration, secondsToMs };
