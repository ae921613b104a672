import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { NoAudioFilesError, TagExtractionError } from "../errors";
import { AudioItem, TagExtractor, TagRecord } from "../types";
import { buildAudiobook, collapseItems } from "./build";

function tags(overrides: Partial<TagRecord> = {}): TagRecord {
  return { artists: [], categories: [], durationMs: 0, chapters: [], ...overrides };
}

function fakeExtractor(byName: Record<string, TagRecord | Error>): TagExtractor {
  return async (filePath: string) => {
    const entry = byName[path.basename(filePath)];
    if (entry === undefined) throw new Error(`unexpected file ${filePath}`);
    if (entry instanceof Error) throw entry;
    return entry;
  };
}

describe("buildAudiobook", () => {
  let root: string;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    root = await fs.mkdtemp(path.join(os.tmpdir(), "build-test-"));
    await fs.writeFile(path.join(root, "01.mp3"), "aaaa");
    await fs.writeFile(path.join(root, "02.mp3"), "bb");
    await fs.writeFile(path.join(root, "cover.jpg"), "img");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("derives items and channel fields from tags", async () => {
    const extractTags = fakeExtractor({
      "01.mp3": tags({
        artists: ["Jane Roe"],
        album: "Test Book",
        title: "Opening",
        categories: ["Fiction"],
        description: "Shared",
        durationMs: 1000.4,
      }),
      "02.mp3": tags({
        artists: ["Jane Roe", "John Doe"],
        album: "Test Book",
        categories: ["Fiction"],
        description: "Shared",
        explicit: true,
        durationMs: 2000,
        chapters: [{ name: "A", start: 0 }],
      }),
    });

    const book = await buildAudiobook(
      root,
      { audio: ["01.mp3", "02.mp3"], cover: ["cover.jpg"], image: ["back.png", "cover.jpg"] },
      { extractTags }
    );

    expect(book).toEqual({
      root,
      title: "Test Book",
      authors: ["Jane Roe", "John Doe"],
      slug: "test_book",
      categories: ["Fiction"],
      description: "Shared",
      explicit: true,
      cover: "cover.jpg",
      artwork: ["cover.jpg", "back.png"],
      items: [
        { path: "01.mp3", title: "Opening", authors: ["Jane Roe"], durationMs: 1000, size: 4, mimetype: "audio/mpeg", chapters: [] },
        {
          path: "02.mp3",
          title: "02",
          authors: ["Jane Roe", "John Doe"],
          durationMs: 2000,
          size: 2,
          mimetype: "audio/mpeg",
          chapters: [{ name: "A", start: 0 }],
          explicit: true,
        },
      ],
    });
  });

  it("keeps per-item fields that differ", async () => {
    const extractTags = fakeExtractor({
      "01.mp3": tags({ album: "Test Book", categories: ["Fiction"], description: "First" }),
      "02.mp3": tags({ album: "Test Book", categories: ["Fiction", "Humor"], description: "Second" }),
    });
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const book = await buildAudiobook(root, { audio: ["01.mp3", "02.mp3"] }, { extractTags });

    expect(book.categories).toEqual(["Fiction", "Humor"]);
    expect(book.description).toBe("First");
    expect(book.items.map((item) => item.categories)).toEqual([["Fiction"], ["Fiction", "Humor"]]);
    expect(book.items.map((item) => item.description)).toEqual(["First", "Second"]);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("multiple descriptions"));
  });

  it("uses placeholders when tags are missing", async () => {
    const book = await buildAudiobook(root, { audio: ["01.mp3"] }, { extractTags: fakeExtractor({ "01.mp3": tags() }) });
    expect(book.title).toBe("Unknown title");
    expect(book.slug).toBe("unknown_title");
    expect(book.authors).toEqual(["Unknown author"]);
    expect(book.items[0].title).toBe("01");
    expect(book.explicit).toBeUndefined();
  });

  it("keeps the first album title when files disagree", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const extractTags = fakeExtractor({
      "01.mp3": tags({ album: "Volume One" }),
      "02.mp3": tags({ album: "Volume Two" }),
    });
    const book = await buildAudiobook(root, { audio: ["01.mp3", "02.mp3"] }, { extractTags });
    expect(book.title).toBe("Volume One");
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("multiple album titles"));
  });

  it("leaves out ignored files by real path", async () => {
    const extractTags = fakeExtractor({ "01.mp3": tags({ album: "Test Book" }) });
    const book = await buildAudiobook(
      root,
      { audio: ["01.mp3", "02.mp3"] },
      { extractTags, ignore: [path.join(root, ".", "02.mp3")] }
    );
    expect(book.items.map((item) => item.path)).toEqual(["01.mp3"]);
  });

  it("skips files whose tags cannot be read", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const extractTags = fakeExtractor({
      "01.mp3": new TagExtractionError(path.join(root, "01.mp3"), "corrupt"),
      "02.mp3": tags({ album: "Test Book" }),
    });
    const book = await buildAudiobook(root, { audio: ["01.mp3", "02.mp3"] }, { extractTags });
    expect(book.items.map((item) => item.path)).toEqual(["02.mp3"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("lets unexpected extractor errors through", async () => {
    const extractTags = fakeExtractor({ "01.mp3": new Error("boom") });
    await expect(buildAudiobook(root, { audio: ["01.mp3"] }, { extractTags })).rejects.toThrow("boom");
  });

  it("refuses a directory without audio", async () => {
    await expect(buildAudiobook(root, {}, { extractTags: fakeExtractor({}) })).rejects.toBeInstanceOf(NoAudioFilesError);
  });
});

describe("collapseItems", () => {
  const item = (path: string, fields: Partial<AudioItem>): AudioItem => ({
    path,
    title: path,
    authors: ["Ann Author"],
    durationMs: 1000,
    size: 10,
    mimetype: "audio/mpeg",
    chapters: [],
    ...fields,
  });

  it("drops only the fields every item shares", () => {
    const items = collapseItems([
      item("01.mp3", { categories: ["Fiction", "Mystery"], description: "first", explicit: true }),
      item("02.mp3", { categories: ["Mystery", "Fiction"], description: "second", explicit: true }),
    ]);
    expect(items.map((entry) => entry.categories)).toEqual([undefined, undefined]);
    expect(items.map((entry) => entry.description)).toEqual(["first", "second"]);
    expect(items.map((entry) => entry.explicit)).toEqual([undefined, undefined]);
  });

  it("keeps a field that one item lacks", () => {
    const items = collapseItems([item("01.mp3", { description: "same" }), item("02.mp3", {})]);
    expect(items[0].description).toBe("same");
  });
});
