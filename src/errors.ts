type ErrorCode =
  | "scan_failed"
  | "tag_extraction_failed"
  | "no_audio_files"
  | "invalid_manifest"
  | "empty_slug"
  | "duplicate_slug"
  | "invalid_duration"
  | "invalid_language"
  | "render_failed"
  | "manifest_not_found"
  | "invalid_label_file"
  | "usage";

class ShelfcastError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

class ScanError extends ShelfcastError {
  constructor(
    readonly directory: string,
    options?: ErrorOptions
  ) {
    super("scan_failed", `Cannot read directory ${directory}`, options);
  }
}

class TagExtractionError extends ShelfcastError {
  constructor(
    readonly file: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super("tag_extraction_failed", `Cannot read tags of ${file}: ${reason}`, options);
  }
}

class NoAudioFilesError extends ShelfcastError {
  constructor(readonly directory: string) {
    super("no_audio_files", `No audio files found in ${directory}`);
  }
}

class ManifestValidationError extends ShelfcastError {
  constructor(
    readonly source: string,
    readonly issues: string[],
    options?: ErrorOptions
  ) {
    super("invalid_manifest", `Invalid manifest ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`, options);
  }
}

class EmptySlugError extends ShelfcastError {
  constructor(readonly title: string) {
    super("empty_slug", `Title "${title}" gives an empty slug; set "slug" in the manifest`);
  }
}

class DuplicateSlugError extends ShelfcastError {
  constructor(
    readonly slug: string,
    directories: string[]
  ) {
    super("duplicate_slug", `Slug "${slug}" is used by more than one audiobook: ${directories.join(", ")}`);
  }
}

class DurationFormatError extends ShelfcastError {
  constructor(readonly value: string) {
    super("invalid_duration", `Unsupported duration format: "${value}"`);
  }
}

class LanguageCodeError extends ShelfcastError {
  constructor(readonly value: string) {
    super("invalid_language", `Invalid language code: "${value}"`);
  }
}

class FeedRenderError extends ShelfcastError {
  constructor(message: string, options?: ErrorOptions) {
    super("render_failed", message, options);
  }
}

class ManifestNotFoundError extends ShelfcastError {
  constructor(readonly file: string) {
    super("manifest_not_found", `No manifest at ${file}; run "init" first`);
  }
}

class LabelFileError extends ShelfcastError {
  constructor(
    readonly file: string,
    readonly line: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super("invalid_label_file", `${file}:${line}: ${reason}`, options);
  }
}

class UsageError extends ShelfcastError {
  constructor(message: string) {
    super("usage", message);
  }
}

export {
  DuplicateSlugError,
  DurationFormatError,
  EmptySlugError,
  FeedRenderError,
  LabelFileError,
  LanguageCodeError,
  ManifestNotFoundError,
  ManifestValidationError,
  NoAudioFilesError,
  ScanError,
  ShelfcastError,
  TagExtractionError,
  UsageError,
};
export type { ErrorCode };
