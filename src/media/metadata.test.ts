import { extensionOf, imageMimeFromPath, mimeFromExt, tagsFromProbe } from "./metadata";

describe("tagsFromProbe", () => {
  it("maps ffprobe tags onto a tag record", () => {
    const record = tagsFromProbe({
      duration: 125.5,
      tags: {
        artist: "Jane Roe;John Doe",
        album: "The Test Book",
        title: "Part 1",
        genre: "Fiction",
        comment: "<b>Read aloud</b>",
        ITUNESADVISORY: "1",
      },
      chapters: [],
    });
    expect(record).toEqual({
      artists: ["Jane Roe", "John Doe"],
      album: "The Test Book",
      title: "Part 1",
      categories: ["Fiction"],
      description: "Read aloud",
      explicit: true,
      durationMs: 125_500,
      chapters: [],
    });
  });

  it("falls back to chapter comments when the container has no chapter table", () => {
    const record = tagsFromProbe({
      tags: { chapter000: "00:00:00", chapter000name: "Opening" },
    });
    expect(record.chapters).toEqual([{ name: "Opening", start: 0 }]);
    expect(record.durationMs).toBe(0);
    expect(record.artists).toEqual([]);
  });

  it("prefers the container's chapters", () => {
    const record = tagsFromProbe({
      tags: { CHAPTER000: "00:00:00", CHAPTER000NAME: "From tags" },
      chapters: [{ start_time: "0", tags: { title: "From table" } }],
    });
    expect(record.chapters).toEqual([{ name: "From table", start: 0 }]);
  });

  it("leaves the explicit flag unset without an advisory tag", () => {
    expect(tagsFromProbe({ tags: {} }).explicit).toBeUndefined();
    expect(tagsFromProbe({ tags: { ITUNESADVISORY: "2" } }).explicit).toBe(false);
  });
});

describe("file types", () => {
  it("maps extensions to MIME types", () => {
    expect(mimeFromExt(".MP3")).toBe("audio/mpeg");
    expect(mimeFromExt(".m4b")).toBe("audio/x-m4b");
    expect(mimeFromExt(".wav")).toBe("application/octet-stream");
    expect(imageMimeFromPath("art/Cover.PNG")).toBe("image/png");
    expect(extensionOf("disc 1/01.Opus")).toBe("opus");
  });
});
