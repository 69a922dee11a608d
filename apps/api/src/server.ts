import "dotenv/config";
import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from "fastify";
import crypto from "node:crypto";
import { Readable } from "node:stream";
import { loadConfig, type GatewayConfig } from "./lib/config.js";
import type { MediaOriginClient } from "./lib/origin.js";
import { openStream, type StreamDeps, type StreamOptions } from "./lib/streaming.js";
import { createTokenStore, scheduleExpiryPurge } from "./store/index.js";
import type { TokenStore } from "./store/types.js";

export type ServerDeps = {
  store: TokenStore;
  origin: MediaOriginClient;
  config: Pick<GatewayConfig, "outputChunkSize" | "tokenTtlSeconds">;
  allowTier?: StreamOptions["allowTier"];
  logger?: boolean;
};

type StreamRoute = { Params: { token: string } };

/** ---------- app init ---------- */

export function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: deps.logger ?? true,
    requestIdHeader: "x-request-id",
    genReqId: () => crypto.randomUUID()
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("x-request-id", req.id);
  });

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    app.log.error({ requestId: req.id, message: String(error?.message || error) }, "Unhandled error");
    const status = Number(error?.statusCode) || 500;
    const payload: { error: string; requestId: string; message?: string; name?: string } = {
      error: status >= 500 ? "Internal Server Error" : error.message,
      requestId: req.id
    };
    if (process.env.NODE_ENV !== "production") {
      payload.message = String(error?.message || error);
      payload.name = error?.name || "Error";
    }
    reply.code(status).send(payload);
  });

  const streamDeps: StreamDeps = {
    store: deps.store,
    origin: deps.origin,
    logger: app.log,
    outputChunkSize: deps.config.outputChunkSize,
    maxAgeSeconds: deps.config.tokenTtlSeconds
  };

  async function handleStream(req: FastifyRequest<StreamRoute>, reply: FastifyReply) {
    const method = req.method === "HEAD" ? "HEAD" : "GET";
    const result = await openStream(streamDeps, req.params.token, req.headers.range, { method, allowTier: deps.allowTier });

    switch (result.kind) {
      case "not_found":
        return reply.code(404).send({ error: "Invalid or expired token" });
      case "forbidden":
        return reply.code(403).send({ error: "Forbidden" });
      case "range_not_satisfiable":
        reply.header("Content-Range", `bytes */${result.size ?? "*"}`);
        return reply.code(416).send({ error: "Range Not Satisfiable" });
      case "origin_unavailable":
        reply.header("Retry-After", String(result.retryAfterSeconds));
        return reply.code(503).send({ error: `Origin unavailable. Retry after ${result.retryAfterSeconds} seconds.` });
      case "ok":
        break;
    }

    reply.code(result.status).headers(result.headers);
    const body = result.body;
    if (!body) return reply.send();

    reply.raw.on("close", () => {
      body.cancel().catch((err: unknown) => {
        req.log.warn({ token: req.params.token, err: err instanceof Error ? err.message : String(err) }, "origin cancel failed");
      });
    });
    return reply.send(Readable.from(body.chunks, { objectMode: false }));
  }

  app.route<StreamRoute>({
    method: ["GET", "HEAD"],
    url: "/stream/:token",
    exposeHeadRoute: false,
    handler: handleStream
  });

  app.get("/health", async () => ({ ok: true, backend: deps.store.backend }));

  return app;
}

/** Loads configuration, opens the store and listens. The caller owns the origin client. */
export async function startServer(origin: MediaOriginClient, config: GatewayConfig = loadConfig()) {
  const store = await createTokenStore(config);
  const app = buildServer({ store, origin, config });
  app.log.info({ event: "store.backend", backend: store.backend }, "token store ready");
  const purge = scheduleExpiryPurge(store, config.purgeIntervalSeconds * 1000, app.log);
  app.addHook("onClose", async () => {
    purge.stop();
    await store.close();
  });
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ baseUrl: config.baseUrl }, "media gateway listening");
  return app;
}
