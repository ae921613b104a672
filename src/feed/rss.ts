import { FEED_TTL, GENERATOR } from "../config";
import { extensionOf } from "../media/metadata";
import { AudioItem, Audiobook } from "../types";
import { assertLangCode } from "../utils/strings";
import { FeedNode, RenderContext, RenderingExtension, el, withChildren } from "./render";

// Episodes are dated one minute apart, newest first, so date-sorting clients keep book order.
const EPISODE_SPACING_MS = 60 * 1000;

const rssExtension: RenderingExtension = {
  name: "rss",

  namespaces() {
    return [];
  },

  renderChannel(book: Audiobook, ctx: RenderContext): FeedNode[] {
    const home = ctx.resolveUrl("home");
    const nodes: FeedNode[] = [el("generator", GENERATOR), el("title", book.title), el("link", home)];
    if (book.description) nodes.push(el("description", book.description));
    if (book.language) nodes.push(el("language", assertLangCode(book.language)));
    for (const category of book.categories) nodes.push(el("category", category));
    if (book.cover) {
      nodes.push(
        withChildren("image", [
          el("url", ctx.resolveUrl("cover", { slug: book.slug })),
          el("title", book.title),
          el("link", home),
        ])
      );
    }
    nodes.push(el("lastBuildDate", (book.manifestModifiedAt ?? ctx.now).toUTCString()));
    nodes.push(el("ttl", FEED_TTL));
    return nodes;
  },

  renderItem(book: Audiobook, item: AudioItem, sequence: number, ctx: RenderContext): FeedNode[] {
    const pubDate = new Date(ctx.now.getTime() - sequence * EPISODE_SPACING_MS);
    const url = ctx.resolveUrl("episode", {
      slug: book.slug,
      sequence: String(sequence),
      ext: extensionOf(item.path),
    });
    const nodes: FeedNode[] = [
      el("title", item.title),
      el("guid", String(sequence), { isPermaLink: "false" }),
      el("pubDate", pubDate.toUTCString()),
    ];
    if (item.description) nodes.push(el("description", item.description));
    nodes.push(el("enclosure", undefined, { url, length: item.size, type: item.mimetype }));
    return nodes;
  },
};

export { rssExtension };
