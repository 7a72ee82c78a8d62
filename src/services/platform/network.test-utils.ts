/**
 * Test server helpers for boundary tests against a real HTTP server.
 *
 * NOTE: For HttpClient mocking, use createMockHttpClient from http-client.state-mock.ts
 */

import {
  createServer as createHttpServer,
  type Server,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";

/**
 * Route handler for test server. Receives the request body read to the end.
 */
export type RouteHandler = (req: IncomingMessage, res: ServerResponse, body: string) => void;

/**
 * Test HTTP server for boundary tests.
 */
export interface TestServer {
  /** Get the port the server is listening on. Throws if not started. */
  getPort(): number;
  /** Start the server. Resolves when listening. */
  start(): Promise<void>;
  /** Stop the server. Resolves when closed. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Build URL for a given path. */
  url(path: string): string;
}

/**
 * Create a test HTTP server for boundary tests.
 *
 * By default includes these routes:
 * - /json → 200, {"status": "ok"}
 * - /echo → 200, returns method, headers and body as JSON
 * - /timeout → Never responds (for timeout testing)
 * - /error/500 → 500 Internal Server Error
 *
 * Unknown paths answer 404.
 *
 * @param routes - Custom routes to add or override defaults
 */
export function createTestServer(routes?: Record<string, RouteHandler>): TestServer {
  let serverPort: number | null = null;
  let server: Server | null = null;
  const pending = new Set<ServerResponse>();

  const defaultRoutes: Record<string, RouteHandler> = {
    "/json": (_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
    },
    "/echo": (req, res, body) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ method: req.method, headers: req.headers, body }));
    },
    "/timeout": (_req, res) => {
      // Never responds - for timeout testing
      pending.add(res);
    },
    "/error/500": (_req, res) => {
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Internal Server Error" }));
    },
  };

  const allRoutes = { ...defaultRoutes, ...routes };

  function requireStarted(): number {
    if (serverPort === null) {
      throw new Error("Server not started - call start() first");
    }
    return serverPort;
  }

  return {
    getPort(): number {
      return requireStarted();
    },

    async start(): Promise<void> {
      if (server) return; // Already started

      const httpServer = createHttpServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on("data", (chunk: Buffer) => chunks.push(chunk));
        req.on("end", () => {
          const handler = allRoutes[req.url ?? ""];
          if (handler) {
            handler(req, res, Buffer.concat(chunks).toString("utf-8"));
          } else {
            res.writeHead(404);
            res.end();
          }
        });
      });
      server = httpServer;

      await new Promise<void>((resolve, reject) => {
        httpServer.listen(0, "127.0.0.1", () => {
          const addr = httpServer.address();
          if (addr && typeof addr === "object") {
            serverPort = addr.port;
            resolve();
          } else {
            reject(new Error("Failed to get server address"));
          }
        });
        httpServer.on("error", reject);
      });
    },

    async stop(): Promise<void> {
      const httpServer = server;
      if (!httpServer || serverPort === null) {
        return; // Already stopped or never started
      }

      for (const res of pending) {
        res.destroy();
      }
      pending.clear();
      httpServer.closeAllConnections();

      await new Promise<void>((resolve) => {
        // Always resolve, even on error (server may already be closed)
        httpServer.close(() => {
          serverPort = null;
          server = null;
          resolve();
        });
      });
    },

    url(path: string): string {
      return `http://127.0.0.1:${requireStarted()}${path}`;
    },
  };
}
