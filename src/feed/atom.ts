import { ATOM_NAMESPACE } from "../config";
import { Audiobook } from "../types";
import { FeedNode, RenderContext, RenderingExtension, el } from "./render";

const atomExtension: RenderingExtension = {
  name: "atom",

  namespaces() {
    return [{ prefix: "atom", uri: ATOM_NAMESPACE }];
  },

  renderChannel(book: Audiobook, ctx: RenderContext): FeedNode[] {
    const nodes: FeedNode[] = [
      el("atom:link", undefined, {
        href: ctx.resolveUrl("feed", { slug: book.slug }),
        rel: "self",
        type: "application/rss+xml",
      }),
    ];
    if (book.cover) nodes.push(el("atom:icon", ctx.resolveUrl("cover", { slug: book.slug })));
    if (book.fanart) nodes.push(el("atom:logo", ctx.resolveUrl("fanart", { slug: book.slug })));
    return nodes;
  },

  renderItem(): FeedNode[] {
    return [];
  },
};

export { atomExtension };
