import Fastify from "fastify";
import type {
  FastifyBaseLogger,
  FastifyError,
  FastifyReply,
  FastifyRequest,
  HTTPMethods,
} from "fastify";
import fastifyCors from "@fastify/cors";
import type {
  CacheStore,
  CalDAVHandler,
  DavRequest,
  Logger,
  SyncEngine,
} from "@taskdav/core";
import { registerHealthRoutes } from "./health.js";

export interface ServerOptions {
  handler: CalDAVHandler;
  engine: SyncEngine;
  store: CacheStore;
  logger: Logger;
  /** Reported by /health */
  version?: string;
}

/** WebDAV methods Fastify does not route out of the box */
const DAV_METHODS = [
  "PROPFIND",
  "REPORT",
  "PROPPATCH",
  "MKCALENDAR",
  "MKCOL",
  "COPY",
  "MOVE",
  "LOCK",
  "UNLOCK",
] as const;

const ROUTED_METHODS: HTTPMethods[] = [
  "GET",
  "HEAD",
  "OPTIONS",
  "PUT",
  "DELETE",
  "PATCH",
  "POST",
  ...DAV_METHODS,
];

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(", ") : value;
}

function toDavRequest(request: FastifyRequest): DavRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    headers[name.toLowerCase()] = headerValue(value);
  }

  const body = request.body;
  return {
    method: request.method,
    path: request.url,
    headers,
    body: typeof body === "string" ? body : Buffer.isBuffer(body) ? body.toString("utf-8") : "",
  };
}

export async function createServer(options: ServerOptions) {
  const { handler } = options;
  const loggerInstance: FastifyBaseLogger = options.logger;

  const fastify = Fastify({ loggerInstance });

  for (const method of DAV_METHODS) {
    fastify.addHttpMethod(method, { hasBody: true });
  }

  // Feed readers fetch /subscribe/… cross-origin; preflight is answered by
  // the CalDAV OPTIONS handler
  await fastify.register(fastifyCors, { origin: true, preflight: false });

  // CalDAV bodies are XML under several content types; hand them over raw
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error }, "request failed");
      return reply.code(500).type("text/plain; charset=utf-8").send("Internal Server Error");
    }
    return reply.code(status).type("text/plain; charset=utf-8").send(error.message);
  });

  await registerHealthRoutes(fastify, {
    engine: options.engine,
    store: options.store,
    version: options.version ?? "0.0.0",
  });

  const dav = async (request: FastifyRequest, reply: FastifyReply) => {
    const response = handler.handle(toDavRequest(request));
    return reply.code(response.status).headers(response.headers).send(response.body);
  };

  fastify.route({ method: ROUTED_METHODS, url: "/", exposeHeadRoute: false, handler: dav });
  fastify.route({ method: ROUTED_METHODS, url: "/*", exposeHeadRoute: false, handler: dav });

  return fastify;
}
