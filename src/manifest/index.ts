import { promises as fs } from "node:fs";
import path from "node:path";
import { YAMLParseError, parse } from "yaml";

import { MANIFEST_FILENAME } from "../config";
import { ManifestValidationError } from "../errors";
import { ManifestDocument, formatIssue, manifestSchema } from "./schema";

type LoadedManifest = {
  document: ManifestDocument;
  path: string;
  modifiedAt: Date;
};

function manifestPath(root: string): string {
  return path.join(root, MANIFEST_FILENAME);
}

/** Checks a parsed document as a whole; nothing is returned unless every field passes. */
function validateManifest(data: unknown, source: string): ManifestDocument {
  // An empty file parses to null and means "no overrides".
  const result = manifestSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ManifestValidationError(source, result.error.issues.map(formatIssue));
  }
  return result.data;
}

function parseManifest(text: string, source: string): ManifestDocument {
  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    if (!(err instanceof YAMLParseError)) throw err;
    throw new ManifestValidationError(source, [err.message], { cause: err });
  }
  return validateManifest(data, source);
}

async function loadManifest(root: string): Promise<LoadedManifest | null> {
  const file = manifestPath(root);
  let text: string;
  let modifiedAt: Date;
  try {
    const stat = await fs.stat(file);
    text = await fs.readFile(file, "utf8");
    modifiedAt = stat.mtime;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
  const document = parseManifest(text, file);
  console.log(`[manifest] loaded path="${file}" items=${document.items?.length ?? 0}`);
  return { document, path: file, modifiedAt };
}

export { loadManifest, manifestPath, parseManifest, validateManifest };
export type { LoadedManifest };
export type { ManifestChapter, ManifestDocument, ManifestItem } from "./schema";
