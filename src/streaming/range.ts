import { createReadStream } from "node:fs";
import { Readable } from "node:stream";

type ByteRange = { start: number; end: number };

/**
 * Reads a single `bytes=` range against a body of `size` bytes. A missing or
 * malformed header yields null (serve the whole body); a well-formed range
 * that selects nothing yields "unsatisfiable".
 */
function parseRange(rangeHeader: string | null, size: number): ByteRange | "unsatisfiable" | null {
  if (!rangeHeader) return null;
  const match = /^bytes=(\d*)-(\d*)$/.exec(rangeHeader.trim());
  if (!match || (match[1] === "" && match[2] === "")) return null;
  if (match[1] === "") {
    // suffix range: the last N bytes
    const length = Number(match[2]);
    if (length === 0 || size === 0) return "unsatisfiable";
    return { start: Math.max(0, size - length), end: size - 1 };
  }
  const start = Number(match[1]);
  const end = match[2] ? Number(match[2]) : size - 1;
  if (start >= size || end < start) return "unsatisfiable";
  return { start, end: Math.min(end, size - 1) };
}

function fileStream(filePath: string, range?: ByteRange): ReadableStream<Uint8Array> {
  const source = range ? createReadStream(filePath, range) : createReadStream(filePath);
  return Readable.toWeb(source);
}

export { fileStream, parseRange };
export type { ByteRange };
