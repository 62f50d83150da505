import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { App, ApiResponse } from "./app.js";
import type { AppConfig } from "./config.js";
import { BadRequestError } from "./errors.js";
import { errorMessage } from "./logger.js";
import type { Logger } from "./logger.js";

const BODY_METHODS = new Set(["POST", "PUT", "PATCH"]);

async function readBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > maxBytes) {
      throw new BadRequestError(`Request body exceeds ${maxBytes} bytes`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (raw === "") {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequestError("Invalid JSON body");
  }
}

function writeResponse(res: ServerResponse, response: ApiResponse): void {
  res.writeHead(response.status, response.headers);
  const body = response.body;
  if (body === undefined || response.status === 204) {
    res.end();
  } else if (typeof body === "string" || Buffer.isBuffer(body)) {
    res.end(body);
  } else {
    res.end(JSON.stringify(body));
  }
}

/**
 * Adapts the request router to node:http.
 */
export function createHttpServer(app: App, config: AppConfig, logger: Logger): Server {
  return createServer(async (req, res) => {
    if (!req.url) {
      writeResponse(res, app.fail(new BadRequestError("Missing URL")));
      return;
    }

    const method = (req.method ?? "GET").toUpperCase();
    const headers: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(req.headers)) {
      headers[key] = Array.isArray(value) ? value.join(", ") : value;
    }

    try {
      // The Host header is client-controlled; routing only needs the path
      const url = new URL(req.url, "http://localhost");
      const body = BODY_METHODS.has(method) ? await readBody(req, config.maxBodyBytes) : undefined;
      const response = await app.handle({
        method,
        path: url.pathname,
        query: Object.fromEntries(url.searchParams),
        headers,
        body,
      });
      writeResponse(res, response);
    } catch (error) {
      if (res.headersSent) {
        logger.error("Error after response started", { url: req.url, error: errorMessage(error) });
        res.end();
        return;
      }
      writeResponse(res, app.fail(error));
    }
  });
}
