import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { Server } from "node:http";
import { createHttpApp, listenHttp } from "../src/http.js";
import { createContext } from "../src/server.js";

const servers: Server[] = [];
let workDir: string | undefined;

afterEach(async () => {
  for (const server of servers.splice(0)) {
    if (server.listening) await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  if (workDir) rmSync(workDir, { recursive: true, force: true });
  workDir = undefined;
});

function app(): Server {
  workDir ??= mkdtempSync(join(process.cwd(), ".test-http-"));
  const server = createHttpApp(createContext({ env: {}, papersDir: join(workDir, "papers"), cwd: workDir }));
  servers.push(server);
  return server;
}

describe("listenHttp", () => {
  it("resolves once the server is listening", async () => {
    const server = app();
    await listenHttp(server, 0, "127.0.0.1");
    expect(server.listening).toBe(true);
  });

  it("rejects when the port is already taken", async () => {
    const first = app();
    await listenHttp(first, 0, "127.0.0.1");
    const address = first.address();
    const port = typeof address === "object" && address !== null ? address.port : -1;

    await expect(listenHttp(app(), port, "127.0.0.1")).rejects.toMatchObject({ code: "EADDRINUSE" });
  });
});
