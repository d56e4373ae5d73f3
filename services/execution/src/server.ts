import http from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";

import { errorMessage, jsonStringify, newTraceId } from "@loanloop/common";

import { routeRequest } from "./api.js";
import type { ApiKeys, ApiResponse } from "./api.js";
import { logLine } from "./log.js";
import type { ExecutionService } from "./service.js";

const SERVICE = "execution/http";

const MAX_BODY_BYTES = 64 * 1024;

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new Error("body too large");
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text.length === 0) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function send(res: ServerResponse, response: ApiResponse): void {
  res.writeHead(response.status, { "content-type": "application/json" });
  res.end(jsonStringify(response.body));
}

function invalid(message: string): ApiResponse {
  return {
    status: 400,
    body: { ok: false, code: "REQUEST_INVALID", message, details: null },
  };
}

async function handle(
  service: ExecutionService,
  keys: ApiKeys,
  req: IncomingMessage,
): Promise<ApiResponse> {
  let text: string;
  try {
    text = await readBody(req);
  } catch {
    return invalid("request body unreadable or too large");
  }
  const parsed = parseJson(text);
  if (!parsed.ok) return invalid("request body is not JSON");

  const url = new URL(req.url ?? "/", "http://localhost");
  return routeRequest(service, keys, {
    method: req.method ?? "GET",
    path: url.pathname,
    authorization: req.headers.authorization,
    body: parsed.value,
    trace_id: newTraceId(),
  });
}

export function createServer(service: ExecutionService, keys: ApiKeys): Server {
  return http.createServer((req, res) => {
    void handle(service, keys, req)
      .then((response) => send(res, response))
      .catch((err: unknown) => {
        logLine(SERVICE, "error", newTraceId(), `response failed: ${errorMessage(err)}`);
        res.destroy();
      });
  });
}

export function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });
}
