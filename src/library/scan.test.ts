import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { ScanError } from "../errors";
import { coverMatcher, makeFilenameMatcher, scan, scanAudiobookDir } from "./scan";

async function touch(root: string, relativePath: string, content = "x") {
  const fullPath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content);
}

describe("makeFilenameMatcher", () => {
  it("matches stem and extension without regard to case", () => {
    expect(coverMatcher("/books/x/Cover.JPG")).toBe(true);
    expect(coverMatcher("/books/x/folder.png")).toBe(true);
    expect(coverMatcher("/books/x/back.jpg")).toBe(false);
    expect(coverMatcher("/books/x/cover.gif")).toBe(false);
  });

  it("treats an omitted list as matching anything", () => {
    const byName = makeFilenameMatcher({ names: ["readme"] });
    expect(byName("/x/README.md")).toBe(true);
    expect(byName("/x/README")).toBe(true);
    expect(byName("/x/notes.md")).toBe(false);
  });
});

describe("scan", () => {
  let root: string;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    root = await fs.mkdtemp(path.join(os.tmpdir(), "scan-test-"));
    await touch(root, "b.mp3");
    await touch(root, "a.MP3");
    await touch(root, "cover.jpg");
    await touch(root, "notes.txt");
    await touch(root, "sub/02.m4b");
    await touch(root, "sub/fanart.png");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("labels files under every classifier they match, sorted by path", async () => {
    const results = await scanAudiobookDir(root);
    expect(results).toEqual({
      audio: ["a.MP3", "b.mp3", path.join("sub", "02.m4b")],
      cover: ["cover.jpg"],
      fanart: [path.join("sub", "fanart.png")],
      image: ["cover.jpg", path.join("sub", "fanart.png")],
    });
  });

  it("leaves out labels nothing matched", async () => {
    const results = await scan(root, { text: makeFilenameMatcher({ extensions: ["txt"] }), pdf: makeFilenameMatcher({ extensions: ["pdf"] }) });
    expect(results).toEqual({ text: ["notes.txt"] });
  });

  it("follows symlinked directories", async () => {
    await fs.symlink(path.join(root, "sub"), path.join(root, "linked"));
    const results = await scanAudiobookDir(root);
    expect(results.audio).toEqual(["a.MP3", "b.mp3", path.join("linked", "02.m4b"), path.join("sub", "02.m4b")]);
  });

  it("skips an entry it cannot stat", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const broken = path.join(root, "x.mp3");
    await fs.symlink(path.join(root, "nowhere", "target.mp3"), broken);

    const results = await scanAudiobookDir(root);

    expect(results.audio).toEqual(["a.MP3", "b.mp3", path.join("sub", "02.m4b")]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      `[scan] skipping unreadable entry path="${broken}": ENOENT: no such file or directory, stat '${broken}'`
    );
  });

  it("fails when the root cannot be read", async () => {
    await expect(scanAudiobookDir(path.join(root, "missing"))).rejects.toBeInstanceOf(ScanError);
  });
});
