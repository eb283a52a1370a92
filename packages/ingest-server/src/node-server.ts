import { createServer, type IncomingHttpHeaders, type Server, type ServerResponse } from "node:http";

import type { TrailLogger } from "@actiontrail/telemetry";

import type { IngestHandler } from "./server.js";

export interface NodeRequestLike extends AsyncIterable<Buffer | string> {
  readonly url?: string;
  readonly method?: string;
  readonly headers: IncomingHttpHeaders;
}

const METHODS_WITHOUT_BODY = new Set(["GET", "HEAD"]);

export const toFetchRequest = async (request: NodeRequestLike, origin: string): Promise<Request> => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(request.headers)) {
    if (Array.isArray(value)) {
      value.forEach((entry) => headers.append(key, entry));
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = (request.method ?? "GET").toUpperCase();
  let body: string | undefined;
  if (!METHODS_WITHOUT_BODY.has(method)) {
    const chunks: Buffer[] = [];
    for await (const chunk of request) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    body = Buffer.concat(chunks).toString("utf8");
  }

  return new Request(new URL(request.url ?? "/", origin), { method, headers, body });
};

export const writeFetchResponse = async (response: Response, target: ServerResponse): Promise<void> => {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  const body = response.body ? Buffer.from(await response.arrayBuffer()) : undefined;
  target.writeHead(response.status, headers);
  target.end(body);
};

export interface StartIngestServerOptions {
  readonly port: number;
  readonly host: string;
  readonly logger: TrailLogger;
}

export interface RunningIngestServer {
  readonly server: Server;
  readonly url: string;
  close(): Promise<void>;
}

/** Serves a fetch-style handler over `node:http`. */
export const startIngestServer = async (
  handler: IngestHandler,
  options: StartIngestServerOptions,
): Promise<RunningIngestServer> => {
  const { logger } = options;
  const server = createServer((incoming, outgoing) => {
    const origin = `http://${incoming.headers.host ?? `${options.host}:${options.port}`}`;
    toFetchRequest(incoming, origin)
      .then((request) => handler(request))
      .then((response) => writeFetchResponse(response, outgoing))
      .catch((error: unknown) => {
        logger.error("ingest.server.request_failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        if (!outgoing.headersSent) {
          outgoing.writeHead(500, { "content-type": "application/json" });
        }
        outgoing.end(JSON.stringify({ detail: "Internal Server Error" }));
      });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  const url = `http://${options.host}:${port}`;
  logger.info("ingest.server.listening", { host: options.host, port });

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeIdleConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
};
