import { XMLBuilder } from "fast-xml-parser";

import { RSS_VERSION } from "../config";
import { FeedRenderError } from "../errors";
import { AudioItem, Audiobook, UrlResolver } from "../types";
import { debugLog } from "../utils/debug";

type AttrValue = string | number | boolean;

/** One element contributed by an extension; the renderer never looks inside. */
type FeedNode = {
  tag: string;
  attrs?: Record<string, AttrValue>;
  text?: string | number;
  children?: FeedNode[];
};

type Namespace = {
  prefix: string;
  uri: string;
};

type RenderContext = {
  resolveUrl: UrlResolver;
  now: Date;
};

interface RenderingExtension {
  readonly name: string;
  namespaces(): Namespace[];
  renderChannel(book: Audiobook, ctx: RenderContext): FeedNode[];
  renderItem(book: Audiobook, item: AudioItem, sequence: number, ctx: RenderContext): FeedNode[];
}

type RenderOptions = {
  resolveUrl: UrlResolver;
  now?: Date;
};

// fast-xml-parser's preserveOrder shape: { tag: children, ":@": { "@_attr": value } }.
type OrderedNode = { [key: string]: OrderedNode[] | Record<string, string> | string };

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  suppressBooleanAttributes: false,
  suppressEmptyNode: true,
  format: true,
  indentBy: "  ",
});

function el(tag: string, text?: string | number, attrs?: Record<string, AttrValue>): FeedNode {
  return {
    tag,
    ...(text !== undefined ? { text } : {}),
    ...(attrs ? { attrs } : {}),
  };
}

function withChildren(tag: string, children: FeedNode[], attrs?: Record<string, AttrValue>): FeedNode {
  return { tag, children, ...(attrs ? { attrs } : {}) };
}

function attributes(attrs: Record<string, AttrValue>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) out[`@_${key}`] = String(value);
  return out;
}

function toOrdered(node: FeedNode): OrderedNode {
  const children: OrderedNode[] = [];
  if (node.text !== undefined) children.push({ "#text": String(node.text) });
  for (const child of node.children ?? []) children.push(toOrdered(child));
  const out: OrderedNode = { [node.tag]: children };
  if (node.attrs && Object.keys(node.attrs).length > 0) out[":@"] = attributes(node.attrs);
  return out;
}

function collectNamespaces(extensions: readonly RenderingExtension[]): Map<string, string> {
  const registered = new Map<string, string>();
  for (const extension of extensions) {
    for (const { prefix, uri } of extension.namespaces()) {
      const existing = registered.get(prefix);
      if (existing !== undefined && existing !== uri) {
        throw new FeedRenderError(
          `Namespace prefix "${prefix}" from extension "${extension.name}" is already bound to ${existing}`
        );
      }
      registered.set(prefix, uri);
    }
  }
  return registered;
}

function runExtension(extension: RenderingExtension, phase: string, render: () => FeedNode[]): FeedNode[] {
  try {
    return render();
  } catch (err) {
    if (err instanceof FeedRenderError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new FeedRenderError(`Extension "${extension.name}" failed rendering ${phase}: ${reason}`, { cause: err });
  }
}

/**
 * Composes `<rss><channel>` from the extensions' nodes: channel nodes in
 * extension order, then one `<item>` per audiobook item numbered from 1.
 * Any extension failure aborts the whole document.
 */
function renderFeed(book: Audiobook, extensions: readonly RenderingExtension[], options: RenderOptions): string {
  const started = Date.now();
  const ctx: RenderContext = { resolveUrl: options.resolveUrl, now: options.now ?? new Date() };

  const rssAttrs: Record<string, string> = { version: RSS_VERSION };
  for (const [prefix, uri] of collectNamespaces(extensions)) rssAttrs[`xmlns:${prefix}`] = uri;

  const channel: FeedNode[] = [];
  for (const extension of extensions) {
    channel.push(...runExtension(extension, "channel", () => extension.renderChannel(book, ctx)));
  }
  book.items.forEach((item, index) => {
    const sequence = index + 1;
    const children: FeedNode[] = [];
    for (const extension of extensions) {
      children.push(
        ...runExtension(extension, `item ${sequence}`, () => extension.renderItem(book, item, sequence, ctx))
      );
    }
    channel.push(withChildren("item", children));
  });

  const rss = withChildren("rss", [withChildren("channel", channel)], rssAttrs);
  const declaration: OrderedNode = {
    "?xml": [{ "#text": "" }],
    ":@": { "@_version": "1.0", "@_encoding": "UTF-8" },
  };
  const xml = `${String(builder.build([declaration, toOrdered(rss)])).trim()}\n`;
  debugLog(`[feed] rendered slug="${book.slug}" items=${book.items.length} in ${Date.now() - started}ms`);
  return xml;
}

export { el, renderFeed, withChildren };
export type { FeedNode, Namespace, RenderContext, RenderOptions, RenderingExtension };
