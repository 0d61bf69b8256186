import http from "node:http";
import { boundPort, startServer, stopServer } from "../../src/core/server/listen";

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  text: string;
  json(): unknown;
}

export interface TestRequest {
  method?: string;
  path?: string;
  headers?: Record<string, string>;
  body?: string;
}

export function serveOnEphemeralPort(handler: http.RequestListener): Promise<http.Server> {
  return startServer(handler, { host: "127.0.0.1", port: 0 });
}

/** A port that was free a moment ago on 127.0.0.1. */
export async function freePort(): Promise<number> {
  const server = await serveOnEphemeralPort((_req, res) => res.end());
  const port = boundPort(server);
  await stopServer(server);
  return port;
}

export function request(server: http.Server | number, req: TestRequest = {}): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const outgoing = http.request(
      {
        host: "127.0.0.1",
        port: typeof server === "number" ? server : boundPort(server),
        method: req.method ?? "GET",
        path: req.path ?? "/",
        headers: req.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", reject);
        res.on("end", () => {
          const text = Buffer.concat(chunks).toString("utf8");
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            text,
            json: () => JSON.parse(text),
          });
        });
      },
    );
    outgoing.on("error", reject);
    if (req.body !== undefined) outgoing.write(req.body);
    outgoing.end();
  });
}
