/**
 * `imview` entry point: serve the viewer for one image, or convert PPM files.
 */

import { ISOLINE, WINDOW } from "../js/CONFIG";
import { USAGE, parseCommand, type Command, type ViewOptions } from "./args";
import { convertPath } from "./convert";
import { UsageError, WatchError, errorMessage } from "./errors";
import { FileChangeMonitor } from "./monitor";
import { ViewerServer } from "./server";
import { ImageStore } from "./store";
import { RenderSurface } from "./surface";

async function runViewer(options: ViewOptions): Promise<number> {
  let store: ImageStore;
  try {
    store = await ImageStore.open(options.path, {
      title: WINDOW.TITLE,
      colormap: options.colormap,
      levels: { preserveLevels: options.preserveLevels, isoline: ISOLINE.INITIAL, bins: options.bins },
    });
  } catch (error) {
    console.error(`[imview] cannot load ${options.path}: ${errorMessage(error)}`);
    return 1;
  }

  const surface = new RenderSurface(store);

  let monitor: FileChangeMonitor | null = null;
  if (!options.static) {
    try {
      monitor = await FileChangeMonitor.watch(options.path, surface.notifyFileChange);
      store.state.watching = true;
    } catch (error) {
      if (!(error instanceof WatchError)) throw error;
      console.warn(`[imview] ${error.message}; running without reloads`);
    }
  }

  const server = await ViewerServer.start(surface, { host: options.host, port: options.port });
  console.log(`[imview] ${options.path} at ${server.url}`);

  await new Promise<void>((resolve) => {
    const stop = (signal: NodeJS.Signals) => {
      console.log(`[imview] ${signal}, shutting down`);
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });

  await monitor?.close();
  await surface.idle();
  await server.close();
  return 0;
}

async function runConvert(target: string): Promise<number> {
  const written = await convertPath(target);
  for (const path of written) {
    console.log(`[imview] wrote ${path}`);
  }
  if (written.length === 0) console.warn(`[imview] no .ppm files in ${target}`);
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`imview: ${error.message}\n\n${USAGE}`);
    return 2;
  }

  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return 0;
    case "convert":
      return runConvert(command.target);
    case "view":
      return runViewer(command.options);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`imview: ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
