import { promises as fs } from "node:fs";
import path from "node:path";

import { FEED_CONTENT_TYPE } from "../config";
import { FeedRenderError } from "../errors";
import { RenderingExtension, defaultExtensions, renderFeed } from "../feed";
import { imageMimeFromPath } from "../media/metadata";
import { fileStream, parseRange } from "../streaming/range";
import { Audiobook, UrlResolver } from "../types";

/** What the HTTP layer needs from the served library. */
interface AudiobookLookup {
  slugs(): string[];
  get(slug: string): Audiobook | undefined;
}

type HandlerOptions = {
  lookup: AudiobookLookup;
  extensions?: readonly RenderingExtension[];
  now?: () => Date;
};

function notFound(): Response {
  return new Response("Not found", { status: 404 });
}

function requestOrigin(request: Request): string {
  const url = new URL(request.url);
  const forwardedProto = request.headers.get("x-forwarded-proto");
  const proto = forwardedProto ? forwardedProto.split(",")[0].trim() : url.protocol.replace(":", "");
  return `${proto}://${url.host}`;
}

function requireParam(params: Record<string, string>, name: string): string {
  const value = params[name];
  if (value === undefined) throw new Error(`missing URL parameter "${name}"`);
  return encodeURIComponent(value);
}

function createUrlResolver(origin: string): UrlResolver {
  return (endpoint, params = {}) => {
    switch (endpoint) {
      case "home":
        return `${origin}/`;
      case "feed":
        return `${origin}/${requireParam(params, "slug")}/feed.xml`;
      case "episode":
        return `${origin}/${requireParam(params, "slug")}/episodes/${requireParam(params, "sequence")}.${requireParam(params, "ext")}`;
      case "cover":
        return `${origin}/${requireParam(params, "slug")}/cover`;
      case "fanart":
        return `${origin}/${requireParam(params, "slug")}/fanart`;
    }
  };
}

async function statFile(filePath: string) {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat : null;
  } catch (err) {
    console.warn(`[http] cannot stat path="${filePath}": ${(err as Error).message}`);
    return null;
  }
}

function insideRoot(root: string, filePath: string): boolean {
  const relative = path.relative(root, filePath);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

function decodeSegment(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

function handleHome(request: Request, lookup: AudiobookLookup): Response {
  const resolveUrl = createUrlResolver(requestOrigin(request));
  const feeds = lookup.slugs().flatMap((slug) => {
    const book = lookup.get(slug);
    return book ? [{ slug, title: book.title, url: resolveUrl("feed", { slug }) }] : [];
  });
  return new Response(JSON.stringify({ feeds }, null, 2), {
    headers: { "Content-Type": "application/json; charset=utf-8" },
  });
}

function handleFeed(request: Request, book: Audiobook, extensions: readonly RenderingExtension[], now: Date): Response {
  const started = Date.now();
  let body: string;
  try {
    body = renderFeed(book, extensions, { resolveUrl: createUrlResolver(requestOrigin(request)), now });
  } catch (err) {
    if (!(err instanceof FeedRenderError)) throw err;
    console.error(`[feed] render failed slug="${book.slug}": ${err.message}`);
    return new Response("Feed rendering failed", { status: 500 });
  }
  console.log(`[feed] /${book.slug}/feed.xml items=${book.items.length} in ${Date.now() - started}ms`);
  return new Response(body, { headers: { "Content-Type": FEED_CONTENT_TYPE } });
}

async function handleEpisode(request: Request, book: Audiobook, sequenceValue: string): Promise<Response> {
  if (!/^\d+$/.test(sequenceValue)) return new Response("Bad episode number", { status: 400 });
  const item = book.items[Number(sequenceValue) - 1];
  if (!item) return notFound();

  const filePath = path.join(book.root, item.path);
  const stat = await statFile(filePath);
  if (!stat) return notFound();
  const size = stat.size;
  const headers: Record<string, string> = {
    "Accept-Ranges": "bytes",
    "Content-Type": item.mimetype,
  };

  const range = parseRange(request.headers.get("range"), size);
  if (range === "unsatisfiable") {
    headers["Content-Range"] = `bytes */${size}`;
    return new Response("Range Not Satisfiable", { status: 416, headers });
  }
  const isHead = request.method === "HEAD";
  if (!range) {
    headers["Content-Length"] = String(size);
    return new Response(isHead ? null : fileStream(filePath), { status: 200, headers });
  }
  headers["Content-Length"] = String(range.end - range.start + 1);
  headers["Content-Range"] = `bytes ${range.start}-${range.end}/${size}`;
  return new Response(isHead ? null : fileStream(filePath, range), { status: 206, headers });
}

async function handleImage(request: Request, book: Audiobook, relativePath: string | undefined): Promise<Response> {
  if (!relativePath) return notFound();
  const filePath = path.resolve(book.root, relativePath);
  if (!insideRoot(book.root, filePath)) {
    console.warn(`[http] refusing path outside root="${book.root}" path="${relativePath}"`);
    return notFound();
  }
  const stat = await statFile(filePath);
  if (!stat) return notFound();
  const headers = {
    "Content-Type": imageMimeFromPath(filePath),
    "Content-Length": String(stat.size),
  };
  return new Response(request.method === "HEAD" ? null : fileStream(filePath), { headers });
}

/**
 * Routes `/{slug}/feed.xml`, `/{slug}/episodes/{n}.{ext}`, `/{slug}/cover`
 * and `/{slug}/fanart`; `/` lists the served feeds.
 */
function createRequestHandler(options: HandlerOptions): (request: Request) => Promise<Response> {
  const extensions = options.extensions ?? defaultExtensions();
  const now = options.now ?? (() => new Date());
  return async (request: Request) => {
    if (request.method !== "GET" && request.method !== "HEAD") {
      return new Response("Method not allowed", { status: 405, headers: { Allow: "GET, HEAD" } });
    }
    const { pathname } = new URL(request.url);
    if (pathname === "/") return handleHome(request, options.lookup);

    const [slugPart = "", ...rest] = pathname.slice(1).split("/");
    const slug = decodeSegment(slugPart);
    const book = slug === null ? undefined : options.lookup.get(slug);
    if (!book) return notFound();
    const route = rest.join("/");

    if (route === "feed.xml") return handleFeed(request, book, extensions, now());
    if (route === "cover") return handleImage(request, book, book.cover);
    if (route === "fanart") return handleImage(request, book, book.fanart);
    const episode = /^episodes\/([^/.]+)\.[^/]+$/.exec(route);
    if (episode) return handleEpisode(request, book, episode[1]);
    return notFound();
  };
}

export { createRequestHandler, createUrlResolver };
export type { AudiobookLookup, HandlerOptions };
