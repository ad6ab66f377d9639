import http from "node:http";
import { randomUUID } from "node:crypto";

import { createRouter, type HttpReply } from "./router.js";
import type { IndexService } from "./indexService.js";

export interface ServerOptions {
  port?: number;
  service?: IndexService;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const route = createRouter({ service: opts.service });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    let reply: HttpReply;
    try {
      reply = route({
        method: req.method ?? "GET",
        path: url.pathname,
        query: url.searchParams,
        contentType: req.headers["content-type"],
        body: await readBody(req),
        requestId,
      });
    } catch (e) {
      console.error(`request ${requestId} failed:`, e);
      res.statusCode = 500;
      res.end();
      return;
    }

    send(res, reply);
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  return Buffer.concat(chunks).toString("utf8");
}

function send(res: http.ServerResponse, reply: HttpReply): void {
  const data = JSON.stringify(reply.body);
  res.statusCode = reply.status;
  res.setHeader("content-type", reply.contentType);
  res.end(data);
}
