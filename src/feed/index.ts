import { atomExtension } from "./atom";
import { itunesExtension } from "./itunes";
import { podloveExtension } from "./podlove";
import { RenderingExtension } from "./render";
import { rssExtension } from "./rss";

/** The extensions every served feed is rendered with, in output order. */
function defaultExtensions(): RenderingExtension[] {
  return [rssExtension, itunesExtension, podloveExtension, atomExtension];
}

export { defaultExtensions };
export { el, renderFeed, withChildren } from "./render";
export type { FeedNode, Namespace, RenderContext, RenderOptions, RenderingExtension } from "./render";
