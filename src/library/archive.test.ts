import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";

import { TagExtractor } from "../types";
import { writeArchive } from "./archive";
import { loadAudiobook } from "./index";

const extractTags: TagExtractor = async (filePath) => ({
  artists: ["Jane Roe"],
  album: "Test Book",
  title: path.basename(filePath, ".mp3"),
  categories: [],
  durationMs: 1000,
  chapters: [],
});

async function entries(file: string): Promise<Record<string, string>> {
  const zip = await JSZip.loadAsync(await fs.readFile(file));
  const out: Record<string, string> = {};
  for (const entry of Object.values(zip.files)) {
    if (!entry.dir) out[entry.name] = await entry.async("string");
  }
  return out;
}

describe("writeArchive", () => {
  let outer: string;
  let root: string;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    outer = await fs.mkdtemp(path.join(os.tmpdir(), "archive-test-"));
    root = path.join(outer, "book");
    await fs.mkdir(path.join(root, "disc 2"), { recursive: true });
    await fs.writeFile(path.join(root, "01.mp3"), "one");
    await fs.writeFile(path.join(root, "disc 2", "02.mp3"), "two");
    await fs.writeFile(path.join(root, "cover.jpg"), "cover");
    await fs.writeFile(path.join(root, "back.png"), "back");
    await fs.writeFile(path.join(root, "notes.txt"), "not packed");
    await fs.writeFile(path.join(root, "shelfcast.yaml"), "slug: packed\n");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(outer, { recursive: true, force: true });
  });

  it("packs audio, artwork and the manifest under the slug", async () => {
    const book = await loadAudiobook(root, { extractTags });
    const output = path.join(outer, "book.zip");

    await writeArchive(book, output);

    expect(await entries(output)).toEqual({
      "packed/01.mp3": "one",
      "packed/disc 2/02.mp3": "two",
      "packed/cover.jpg": "cover",
      "packed/back.png": "back",
      "packed/shelfcast.yaml": "slug: packed\n",
    });
  });

  it("leaves the manifest out when asked", async () => {
    const book = await loadAudiobook(root, { extractTags });
    const output = path.join(outer, "book.zip");

    await writeArchive(book, output, { skipManifest: true });

    expect(Object.keys(await entries(output)).sort()).toEqual([
      "packed/01.mp3",
      "packed/back.png",
      "packed/cover.jpg",
      "packed/disc 2/02.mp3",
    ]);
  });
});
