/**
 * Command-line parsing for `imview`.
 */

import { parseArgs } from "node:util";
import { DEFAULT_PATH, LEVELS, SERVER } from "../js/CONFIG";
import { COLORMAP_NAMES, DEFAULT_COLORMAP, isColormapName, type ColormapName } from "../js/core/colormaps";
import { UsageError, errorMessage } from "./errors";

export interface ViewOptions {
  path: string;
  host: string;
  port: number;
  preserveLevels: boolean;
  /** Skip file watching. */
  static: boolean;
  bins: number;
  colormap: ColormapName;
}

export type Command =
  | { kind: "view"; options: ViewOptions }
  | { kind: "convert"; target: string }
  | { kind: "help" };

export const USAGE = `usage: imview [path] [options]
       imview convert <file.ppm|dir>

Show an image and reload it whenever the file changes.
path defaults to ${DEFAULT_PATH}.

options:
  --host <host>         address to serve on (default ${SERVER.HOST})
  --port <port>         port to serve on, 0 for any (default ${SERVER.PORT})
  --preserve-levels     keep hand-set levels across reloads
  --static              do not watch the file
  --bins <n>            histogram bins (default ${LEVELS.BINS})
  --colormap <name>     ${COLORMAP_NAMES.join(", ")} (default ${DEFAULT_COLORMAP})
  -h, --help            show this help`;

function parseInteger(name: string, text: string | undefined, fallback: number, min: number, max: number): number {
  if (text === undefined) return fallback;
  if (!/^\d+$/.test(text)) throw new UsageError(`--${name} expects an integer, got "${text}"`);
  const value = Number(text);
  if (value < min || value > max) throw new UsageError(`--${name} must be between ${min} and ${max}`);
  return value;
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        host: { type: "string" },
        port: { type: "string" },
        "preserve-levels": { type: "boolean", default: LEVELS.PRESERVE_ON_RELOAD },
        static: { type: "boolean", default: false },
        bins: { type: "string" },
        colormap: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error), { cause: error });
  }
}

/**
 * Parse arguments after the program name.
 * @throws UsageError for unknown options or bad values
 */
export function parseCommand(argv: string[]): Command {
  const parsed = parseRaw(argv);
  const { values, positionals } = parsed;
  if (values.help) return { kind: "help" };

  if (positionals[0] === "convert") {
    if (positionals.length !== 2) throw new UsageError("convert expects exactly one file or directory");
    return { kind: "convert", target: positionals[1] };
  }
  if (positionals.length > 1) throw new UsageError(`expected one path, got ${positionals.length}`);

  const colormap = values.colormap ?? DEFAULT_COLORMAP;
  if (!isColormapName(colormap)) {
    throw new UsageError(`unknown colormap "${colormap}"; expected one of ${COLORMAP_NAMES.join(", ")}`);
  }

  return {
    kind: "view",
    options: {
      path: positionals[0] ?? DEFAULT_PATH,
      host: values.host ?? SERVER.HOST,
      port: parseInteger("port", values.port, SERVER.PORT, 0, 65535),
      preserveLevels: values["preserve-levels"],
      static: values.static,
      bins: parseInteger("bins", values.bins, LEVELS.BINS, 1, 65536),
      colormap,
    },
  };
}
