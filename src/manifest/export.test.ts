import { parse } from "yaml";

import { AudioItem, Audiobook } from "../types";
import { dumpManifest, exportManifestDocument, normalizeForExport } from "./export";
import { parseManifest } from "./index";
import { mergeManifest } from "./merge";

function item(itemPath: string, overrides: Partial<AudioItem> = {}): AudioItem {
  return {
    path: itemPath,
    title: itemPath,
    authors: ["Jane Roe"],
    durationMs: 61_000,
    size: 2048,
    mimetype: "audio/mpeg",
    chapters: [],
    ...overrides,
  };
}

function derivedBook(): Audiobook {
  return {
    root: "/books/test",
    title: "Test Book",
    authors: ["Jane Roe"],
    slug: "test_book",
    categories: ["Fiction"],
    cover: "cover.jpg",
    fanart: "fanart.png",
    explicit: true,
    items: [
      item("01.mp3", {
        title: "Opening",
        chapters: [
          { name: "Start", start: 0, end: 30_250 },
          { name: "Later", start: 30_250, url: "https://example.com/later" },
        ],
      }),
      item("02.mp3", { title: "Middle", explicit: true }),
      item("03.mp3", { title: "End", description: "The last part" }),
    ],
  };
}

describe("normalizeForExport", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("keeps only manifest fields, in a fixed key order", () => {
    const exported = normalizeForExport(derivedBook());

    expect(Object.keys(exported)).toEqual(["authors", "title", "slug", "categories", "explicit", "cover", "items"]);
    expect(exported.items?.map((entry) => Object.keys(entry))).toEqual([
      ["path", "title", "sequence", "chapters"],
      ["path", "title", "sequence", "explicit"],
      ["path", "title", "sequence", "description"],
    ]);
    expect(exported.items?.[0].chapters).toEqual([
      { name: "Start", start: "00:00:00", end: "00:00:30.250" },
      { name: "Later", start: "00:00:30.250", url: "https://example.com/later" },
    ]);
  });

  it("keeps per-item authors when they differ from the channel", () => {
    const book = derivedBook();
    book.items[1] = { ...book.items[1], authors: ["John Doe"] };

    const exported = normalizeForExport(book);

    expect(exported.items?.map((entry) => entry.authors)).toEqual([["Jane Roe"], ["John Doe"], ["Jane Roe"]]);
  });

  it("writes YAML that reads back to the same document", () => {
    const exported = normalizeForExport(derivedBook());
    expect(parse(dumpManifest(exported))).toEqual(exported);
  });

  it("writes plain block YAML", () => {
    const book: Audiobook = {
      root: "/books/test",
      title: "Test Book",
      authors: ["Jane Roe"],
      slug: "test_book",
      categories: ["Fiction"],
      items: [item("a.mp3", { title: "Alpha" })],
    };
    expect(dumpManifest(normalizeForExport(book))).toBe(
      [
        "authors:",
        "  - Jane Roe",
        "title: Test Book",
        "slug: test_book",
        "categories:",
        "  - Fiction",
        "items:",
        "  - path: a.mp3",
        "    title: Alpha",
        "    sequence: 1",
        "",
      ].join("\n")
    );
  });

  it("re-merging an export changes nothing", () => {
    const derived = derivedBook();
    const manifest = parseManifest(
      [
        "title: Renamed Book",
        "language: en",
        "items:",
        "  - path: 03.mp3",
        "    sequence: 1",
        "  - path: 01.mp3",
        "    chapters:",
        "      - name: Only",
        '        start: "00:00:01.001"',
      ].join("\n"),
      "test.yaml"
    );
    const merged = mergeManifest(derived, manifest);

    const reloaded = parseManifest(dumpManifest(normalizeForExport(merged)), "export.yaml");

    expect(mergeManifest(derived, reloaded)).toEqual(merged);
  });
});

describe("exportManifestDocument", () => {
  it("writes a loaded manifest back in key order with formatted positions", () => {
    const exported = exportManifestDocument({
      items: [{ chapters: [{ start: 1_500, name: "Intro", end: 60_000 }], title: "One", path: "01.mp3" }],
      language: "en",
      title: "Test Book",
    });

    expect(Object.keys(exported)).toEqual(["title", "language", "items"]);
    expect(exported.items).toEqual([
      { path: "01.mp3", title: "One", chapters: [{ name: "Intro", start: "00:00:01.500", end: "00:01:00" }] },
    ]);
    expect(exported.items?.map((entry) => Object.keys(entry))).toEqual([["path", "title", "chapters"]]);
  });
});
