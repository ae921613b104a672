import { FSWatcher, watch } from "node:fs";

import { rescanDelayMs } from "../config";
import { DuplicateSlugError } from "../errors";
import { loadManifest } from "../manifest";
import { MergeOptions, mergeManifest } from "../manifest/merge";
import { Audiobook, TagExtractor } from "../types";
import { buildAudiobook } from "./build";
import { scanAudiobookDir } from "./scan";

type LibraryOptions = {
  ignore?: Iterable<string>;
  extractTags?: TagExtractor;
  rescanDelayMs?: number;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Scan, build, then overlay the manifest found in `root`, if any. */
async function loadAudiobook(root: string, options: LibraryOptions = {}, mergeOptions: MergeOptions = {}): Promise<Audiobook> {
  const scanResults = await scanAudiobookDir(root);
  const derived = await buildAudiobook(root, scanResults, { ignore: options.ignore, extractTags: options.extractTags });
  const manifest = await loadManifest(root);
  return mergeManifest(derived, manifest?.document ?? null, { ...mergeOptions, modifiedAt: manifest?.modifiedAt });
}

/**
 * One served audiobook directory. The merged model is frozen and replaced
 * whole on rebuild; a failed rebuild leaves the previous model in place.
 */
class AudiobookLibrary {
  private model: Audiobook | null = null;
  private inFlight: Promise<Audiobook> | null = null;
  private queued: Promise<Audiobook> | null = null;
  private rescanTimer: ReturnType<typeof setTimeout> | null = null;
  private watcher: FSWatcher | null = null;

  constructor(
    readonly root: string,
    private readonly options: LibraryOptions = {}
  ) {}

  get current(): Audiobook | null {
    return this.model;
  }

  hasSlug(slug: string): boolean {
    return this.model !== null && this.model.slug === slug;
  }

  /** First load; errors propagate to the caller. */
  async load(): Promise<Audiobook> {
    return this.rebuild();
  }

  /**
   * Runs one scan-build-merge pass at a time. A call made while a pass is
   * running gets a single follow-up pass, shared with every other call made
   * before that pass starts, so changes the running pass already scanned past
   * are picked up.
   */
  rebuild(): Promise<Audiobook> {
    if (!this.inFlight) return this.startRebuild();
    if (!this.queued) {
      const next = () => {
        this.queued = null;
        return this.inFlight ?? this.startRebuild();
      };
      this.queued = this.inFlight.then(next, next);
    }
    return this.queued;
  }

  private startRebuild(): Promise<Audiobook> {
    const started = Date.now();
    this.inFlight = loadAudiobook(this.root, this.options)
      .then((book) => {
        this.model = deepFreeze(book);
        console.log(`[library] ready root="${this.root}" slug="${book.slug}" items=${book.items.length} in ${Date.now() - started}ms`);
        return this.model;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  scheduleRebuild(delayMs = this.options.rescanDelayMs ?? rescanDelayMs) {
    if (this.rescanTimer) clearTimeout(this.rescanTimer);
    this.rescanTimer = setTimeout(() => {
      this.rescanTimer = null;
      this.rebuild().catch((err: Error) => {
        console.error(`[library] rebuild failed root="${this.root}", keeping previous feed: ${err.message}`);
      });
    }, delayMs);
  }

  watch() {
    if (this.watcher) return;
    try {
      this.watcher = watch(this.root, { recursive: true }, (eventType, filename) => {
        const fileLabel = filename ? ` file="${filename}"` : "";
        console.log(`[watch] root="${this.root}" event=${eventType}${fileLabel}`);
        this.scheduleRebuild();
      });
      this.watcher.on("error", (err) => console.warn(`[watch] watcher error root="${this.root}": ${err.message}`));
    } catch (err) {
      console.warn(`[watch] failed to watch root="${this.root}": ${(err as Error).message}`);
    }
  }

  close() {
    if (this.rescanTimer) clearTimeout(this.rescanTimer);
    this.rescanTimer = null;
    this.watcher?.close();
    this.watcher = null;
  }
}

function assertUniqueSlugs(libraries: readonly AudiobookLibrary[]) {
  const bySlug = new Map<string, string[]>();
  for (const library of libraries) {
    if (!library.current) continue;
    const slug = library.current.slug;
    bySlug.set(slug, [...(bySlug.get(slug) ?? []), library.root]);
  }
  for (const [slug, roots] of bySlug) {
    if (roots.length > 1) throw new DuplicateSlugError(slug, roots);
  }
}

/** Slug lookup across every served directory; the first directory wins a clash. */
class LibraryRegistry {
  constructor(private readonly libraries: readonly AudiobookLibrary[]) {}

  slugs(): string[] {
    return Array.from(new Set(this.libraries.flatMap((library) => (library.current ? [library.current.slug] : []))));
  }

  get(slug: string): Audiobook | undefined {
    return this.libraries.find((library) => library.hasSlug(slug))?.current ?? undefined;
  }
}

export { AudiobookLibrary, LibraryRegistry, assertUniqueSlugs, loadAudiobook };
export type { LibraryOptions };
