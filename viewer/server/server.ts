/**
 * Loopback HTTP server: serves the page through Vite in middleware mode and
 * accepts page sockets on the `/ws` path.
 */

import { createServer as createHttpServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { fileURLToPath } from "node:url";
import { createServer as createViteServer, type ViteDevServer } from "vite";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { SERVER } from "../js/CONFIG";
import type { PageConnection, RenderSurface } from "./surface";

/** Directory holding index.html and the page sources. */
export const PAGE_ROOT = fileURLToPath(new URL("../js", import.meta.url));

export interface ViewerServerOptions {
  host?: string;
  port?: number;
  pageRoot?: string;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/** Adapt a socket to the surface's page interface. */
export function socketPage(ws: WebSocket): PageConnection {
  return {
    sendText(text) {
      if (ws.readyState === WebSocket.OPEN) ws.send(text);
    },
    sendBinary(data) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data, { binary: true });
    },
  };
}

export class ViewerServer {
  private constructor(
    private readonly http: Server,
    private readonly wss: WebSocketServer,
    private readonly vite: ViteDevServer,
  ) {}

  static async start(surface: RenderSurface, options: ViewerServerOptions = {}): Promise<ViewerServer> {
    const vite = await createViteServer({
      root: options.pageRoot ?? PAGE_ROOT,
      configFile: false,
      appType: "spa",
      logLevel: "warn",
      server: { middlewareMode: true, hmr: false },
      esbuild: { jsx: "automatic" },
    });

    const http = createHttpServer(vite.middlewares);
    const wss = new WebSocketServer({ server: http, path: SERVER.SOCKET_PATH });

    wss.on("connection", (ws) => {
      const page = socketPage(ws);
      surface.attach(page);
      console.log(`[ViewerServer] page connected (${surface.pageCount} open)`);

      ws.on("message", (data, isBinary) => {
        if (isBinary) {
          console.warn("[ViewerServer] ignoring binary message from page");
          return;
        }
        surface.handleMessage(page, rawDataToString(data));
      });
      ws.on("close", () => {
        surface.detach(page);
        console.log(`[ViewerServer] page disconnected (${surface.pageCount} open)`);
      });
      ws.on("error", (error) => {
        console.error("[ViewerServer] socket error:", error);
      });
    });

    await new Promise<void>((resolve, reject) => {
      http.once("error", reject);
      http.listen(options.port ?? SERVER.PORT, options.host ?? SERVER.HOST, () => {
        http.off("error", reject);
        resolve();
      });
    });

    return new ViewerServer(http, wss, vite);
  }

  get url(): string {
    const address = this.http.address();
    if (address === null || typeof address === "string") return String(address);
    const { address: host, port }: AddressInfo = address;
    const shown = host.includes(":") ? `[${host}]` : host;
    return `http://${shown}:${port}/`;
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.close(1001, "viewer shutting down");
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
    await this.vite.close();
    await new Promise<void>((resolve, reject) => {
      this.http.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
