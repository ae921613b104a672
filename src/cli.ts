import { UsageError } from "./errors";

type CliCommand =
  | { command: "serve"; dirs: string[]; ignore: string[]; port?: number }
  | { command: "init"; dir: string; ignore: string[]; output?: string }
  | { command: "feed"; dir: string; ignore: string[] }
  | { command: "chapters"; dir: string; labelFile: string; item: number; ignoreEnd: boolean }
  | { command: "archive"; dir: string; output: string; ignore: string[]; skipManifest: boolean };

const USAGE = `usage:
  server.ts serve [--port <n>] [--ignore <file>]... <dir>...
  server.ts init [--ignore <file>]... [--output <file>|-] <dir>
  server.ts feed [--ignore <file>]... <dir>
  server.ts chapters [--ignore-end] <dir> <label-file> <item-number>
  server.ts archive [--ignore <file>]... [--no-manifest] <dir> <output.zip>`;

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || (value.startsWith("-") && value !== "-")) {
    throw new UsageError(`${flag} needs a value\n${USAGE}`);
  }
  return value;
}

function singleDir(command: string, positional: string[]): string {
  if (positional.length !== 1) throw new UsageError(`${command} takes exactly one directory\n${USAGE}`);
  return positional[0];
}

function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...args] = argv;
  const ignore: string[] = [];
  const positional: string[] = [];
  let output: string | undefined;
  let port: number | undefined;
  let ignoreEnd = false;
  let skipManifest = false;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "--ignore") {
      ignore.push(takeValue(args, index, arg));
      index += 1;
    } else if ((arg === "--output" || arg === "-o") && command === "init") {
      output = takeValue(args, index, arg);
      index += 1;
    } else if ((arg === "--port" || arg === "-p") && command === "serve") {
      const raw = takeValue(args, index, arg);
      port = Number.parseInt(raw, 10);
      if (!/^\d+$/.test(raw) || port > 65535) throw new UsageError(`invalid port: ${raw}`);
      index += 1;
    } else if (arg === "--ignore-end" && command === "chapters") {
      ignoreEnd = true;
    } else if ((arg === "--no-manifest" || arg === "-M") && command === "archive") {
      skipManifest = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option ${arg}\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  switch (command) {
    case "serve":
      if (positional.length === 0) throw new UsageError(`serve needs at least one directory\n${USAGE}`);
      return { command, dirs: positional, ignore, ...(port !== undefined ? { port } : {}) };
    case "init":
      return { command, dir: singleDir(command, positional), ignore, ...(output !== undefined ? { output } : {}) };
    case "feed":
      return { command, dir: singleDir(command, positional), ignore };
    case "chapters": {
      if (positional.length !== 3) throw new UsageError(`chapters takes a directory, a label file and an item number\n${USAGE}`);
      if (ignore.length > 0) throw new UsageError(`chapters does not take --ignore\n${USAGE}`);
      const [dir, labelFile, item] = positional;
      if (!/^[1-9]\d*$/.test(item)) throw new UsageError(`invalid item number: ${item}`);
      return { command, dir, labelFile, item: Number.parseInt(item, 10), ignoreEnd };
    }
    case "archive": {
      if (positional.length !== 2) throw new UsageError(`archive takes a directory and an output file\n${USAGE}`);
      const [dir, output] = positional;
      return { command, dir, output, ignore, skipManifest };
    }
    default:
      throw new UsageError(command ? `unknown command ${command}\n${USAGE}` : USAGE);
  }
}

export { parseCliArgs };
export type { CliCommand };
