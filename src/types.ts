export type Chapter = {
  name: string;
  start: number;
  end?: number;
  url?: string;
};

export type AudioItem = {
  /** Relative to the audiobook root. */
  path: string;
  title: string;
  authors: string[];
  description?: string;
  categories?: string[];
  durationMs: number;
  size: number;
  mimetype: string;
  explicit?: boolean;
  chapters: Chapter[];
  sequence?: number;
};

export type Audiobook = {
  root: string;
  title: string;
  authors: string[];
  slug: string;
  description?: string;
  language?: string;
  categories: string[];
  explicit?: boolean;
  cover?: string;
  fanart?: string;
  /** Every image found below the root: cover, then fan art, then the rest. */
  artwork?: string[];
  items: AudioItem[];
  manifestModifiedAt?: Date;
};

export type ChapterTag = Chapter;

export type TagRecord = {
  artists: string[];
  album?: string;
  title?: string;
  categories: string[];
  description?: string;
  explicit?: boolean;
  durationMs: number;
  chapters: ChapterTag[];
};

export type TagExtractor = (filePath: string) => Promise<TagRecord>;

export type ScanLabel = "audio" | "cover" | "fanart" | "image";

export type Classifier = (filePath: string) => boolean;

export type ScanResults = Partial<Record<ScanLabel, string[]>>;

export type ProbeData = {
  duration?: number;
  tags?: Record<string, string>;
  chapters?: FfprobeChapter[];
};

export type FfprobeChapter = {
  start_time?: string;
  end_time?: string;
  tags?: Record<string, string>;
};

export type Endpoint = "home" | "feed" | "episode" | "cover" | "fanart";

export type UrlResolver = (endpoint: Endpoint, params?: Record<string, string>) => string;
