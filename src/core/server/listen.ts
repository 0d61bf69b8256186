// src/core/server/listen.ts

import http from "http";

export type ListenOptions = {
  host: string;
  port: number;
};

/**
 * Binds `handler` to host:port. Resolves once the socket is listening,
 * rejects with the listen error (EADDRINUSE, EACCES, ...) otherwise.
 */
export function startServer(
  handler: http.RequestListener,
  { host, port }: ListenOptions
): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(handler);

    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve(server);
    };

    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export function boundPort(server: http.Server): number {
  const addr = server.address();
  if (addr && typeof addr === "object") return addr.port;
  throw new Error("server is not listening on a TCP port");
}
