import { PSC_NAMESPACE, PSC_VERSION } from "../config";
import { AudioItem, Audiobook, Chapter } from "../types";
import { formatDuration } from "../utils/time";
import { FeedNode, RenderingExtension, el, withChildren } from "./render";

function chapterNode(chapter: Chapter): FeedNode {
  return el("psc:chapter", undefined, {
    title: chapter.name,
    start: formatDuration(chapter.start, { millis: chapter.start % 1000 !== 0 }),
    ...(chapter.url ? { href: chapter.url } : {}),
  });
}

/** Podlove Simple Chapters, one block per item that has chapters. */
const podloveExtension: RenderingExtension = {
  name: "podlove",

  namespaces() {
    return [{ prefix: "psc", uri: PSC_NAMESPACE }];
  },

  renderChannel(): FeedNode[] {
    return [];
  },

  renderItem(_book: Audiobook, item: AudioItem): FeedNode[] {
    if (item.chapters.length === 0) return [];
    return [withChildren("psc:chapters", item.chapters.map(chapterNode), { version: PSC_VERSION })];
  },
};

export { podloveExtension };
