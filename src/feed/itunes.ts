import { ITUNES_NAMESPACE } from "../config";
import { AudioItem, Audiobook } from "../types";
import { formatDuration } from "../utils/time";
import { FeedNode, RenderContext, RenderingExtension, el } from "./render";

function explicitValue(explicit: boolean): string {
  return explicit ? "true" : "false";
}

const itunesExtension: RenderingExtension = {
  name: "itunes",

  namespaces() {
    return [{ prefix: "itunes", uri: ITUNES_NAMESPACE }];
  },

  renderChannel(book: Audiobook, ctx: RenderContext): FeedNode[] {
    const nodes: FeedNode[] = [el("itunes:author", book.authors.join(", "))];
    for (const category of book.categories) nodes.push(el("itunes:category", undefined, { text: category }));
    if (book.cover) nodes.push(el("itunes:image", undefined, { href: ctx.resolveUrl("cover", { slug: book.slug }) }));
    if (book.explicit !== undefined) nodes.push(el("itunes:explicit", explicitValue(book.explicit)));
    return nodes;
  },

  renderItem(_book: Audiobook, item: AudioItem): FeedNode[] {
    const nodes: FeedNode[] = [el("itunes:duration", formatDuration(item.durationMs))];
    if (item.explicit !== undefined) nodes.push(el("itunes:explicit", explicitValue(item.explicit)));
    return nodes;
  },
};

export { itunesExtension };
