import type http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { boundPort, startServer, stopServer } from "../src/core/server/listen";
import { request, serveOnEphemeralPort } from "./helpers/http-client";

const hello: http.RequestListener = (_req, res) => {
  res.writeHead(200, { "content-type": "text/plain" });
  res.end("hello");
};

describe("startServer", () => {
  const servers: http.Server[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      if (server.listening) await stopServer(server);
    }
  });

  it("resolves once the server is listening", async () => {
    const server = await serveOnEphemeralPort(hello);
    servers.push(server);

    expect(server.listening).toBe(true);
    expect(boundPort(server)).toBeGreaterThan(0);

    const res = await request(server);
    expect(res.status).toBe(200);
    expect(res.text).toBe("hello");
  });

  it("rejects a second server on the same host and port", async () => {
    const first = await serveOnEphemeralPort(hello);
    servers.push(first);

    await expect(startServer(hello, { host: "127.0.0.1", port: boundPort(first) })).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
    expect(first.listening).toBe(true);
  });

  it("stops the server", async () => {
    const server = await serveOnEphemeralPort(hello);

    await stopServer(server);

    expect(server.listening).toBe(false);
    expect(() => boundPort(server)).toThrow("server is not listening on a TCP port");
  });
});
