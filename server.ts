#!/usr/bin/env node
import { promises as fs } from "node:fs";
import { IncomingMessage, ServerResponse, createServer } from "node:http";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { CliCommand, parseCliArgs } from "./src/cli";
import { port as defaultPort } from "./src/config";
import { ShelfcastError } from "./src/errors";
import { defaultExtensions, renderFeed } from "./src/feed";
import { createRequestHandler, createUrlResolver } from "./src/http/handlers";
import { AudiobookLibrary, LibraryRegistry, assertUniqueSlugs, loadAudiobook } from "./src/library";
import { writeArchive } from "./src/library/archive";
import { manifestPath } from "./src/manifest";
import { importChapters } from "./src/manifest/chapters";
import { dumpManifest, normalizeForExport } from "./src/manifest/export";
import { debugLog } from "./src/utils/debug";

function toRequest(req: IncomingMessage, fallbackHost: string): Request {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? fallbackHost}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) value.forEach((entry) => headers.append(key, entry));
    else headers.set(key, value);
  }
  return new Request(url, { method: req.method, headers });
}

async function sendResponse(response: Response, res: ServerResponse) {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => res.setHeader(key, value));
  if (!response.body) {
    res.end();
    return;
  }
  await pipeline(Readable.fromWeb(response.body), res);
}

async function serve(command: Extract<CliCommand, { command: "serve" }>) {
  const libraries = command.dirs.map((dir) => new AudiobookLibrary(path.resolve(dir), { ignore: command.ignore }));
  for (const library of libraries) await library.load();
  assertUniqueSlugs(libraries);
  libraries.forEach((library) => library.watch());

  const listenPort = command.port ?? defaultPort;
  const handle = createRequestHandler({ lookup: new LibraryRegistry(libraries), extensions: defaultExtensions() });
  const server = createServer((req, res) => {
    const started = Date.now();
    handle(toRequest(req, `localhost:${listenPort}`))
      .then((response) => sendResponse(response, res))
      .then(() => debugLog(`[http] ${req.method} ${req.url} ${res.statusCode} in ${Date.now() - started}ms`))
      .catch((err: Error) => {
        console.error(`[http] ${req.method} ${req.url} failed: ${err.message}`);
        if (res.headersSent) {
          res.destroy(err);
          return;
        }
        res.statusCode = 500;
        res.end("Internal server error");
      });
  });

  const shutdown = () => {
    libraries.forEach((library) => library.close());
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  server.listen(listenPort, () => {
    const localBase = `http://localhost${listenPort === 80 ? "" : `:${listenPort}`}`;
    console.log(`Listening on port ${listenPort}. Roots: ${libraries.map((library) => library.root).join(", ")}`);
    for (const library of libraries) {
      if (library.current) console.log(`Feed: ${localBase}/${encodeURIComponent(library.current.slug)}/feed.xml`);
    }
  });
}

async function init(command: Extract<CliCommand, { command: "init" }>) {
  const root = path.resolve(command.dir);
  const book = await loadAudiobook(root, { ignore: command.ignore }, { allowEmptySlug: true });
  const yaml = dumpManifest(normalizeForExport(book));
  if (command.output === "-") {
    process.stdout.write(yaml);
    return;
  }
  const output = command.output ? path.resolve(command.output) : manifestPath(root);
  await fs.writeFile(output, yaml, "utf8");
  console.log(`[init] wrote ${output}`);
}

async function printFeed(command: Extract<CliCommand, { command: "feed" }>) {
  const book = await loadAudiobook(path.resolve(command.dir), { ignore: command.ignore });
  const resolveUrl = createUrlResolver(`http://localhost:${defaultPort}`);
  process.stdout.write(renderFeed(book, defaultExtensions(), { resolveUrl }));
}

async function chapters(command: Extract<CliCommand, { command: "chapters" }>) {
  await importChapters(path.resolve(command.dir), path.resolve(command.labelFile), command.item, {
    ignoreEnd: command.ignoreEnd,
  });
}

async function archive(command: Extract<CliCommand, { command: "archive" }>) {
  const book = await loadAudiobook(path.resolve(command.dir), { ignore: command.ignore });
  await writeArchive(book, path.resolve(command.output), { skipManifest: command.skipManifest });
}

async function main(argv: string[]) {
  const command = parseCliArgs(argv);
  if (command.command === "feed" || (command.command === "init" && command.output === "-")) {
    // stdout carries the document; progress goes to stderr.
    console.log = console.warn;
  }
  switch (command.command) {
    case "serve":
      return serve(command);
    case "init":
      return init(command);
    case "feed":
      return printFeed(command);
    case "chapters":
      return chapters(command);
    case "archive":
      return archive(command);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof ShelfcastError) console.error(err.message);
  else console.error("Fatal:", err);
  process.exitCode = 1;
});
