import Fastify from "fastify";
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest, FastifyServerOptions } from "fastify";
import formbody from "@fastify/formbody";
import helmet from "@fastify/helmet";
import type { Config } from "./config.js";
import { CodeGenerationError, DuplicateCodeError } from "./errors.js";
import { createLink } from "./links.js";
import {
  httpRequestDurationSeconds,
  httpRequestsTotal,
  registry,
  shortLinkResolutionsTotal,
  shortLinksCreatedTotal
} from "./metrics.js";
import { getOrCreateRequestId } from "./request_id.js";
import { resolveLink } from "./resolver.js";
import type { UrlStore } from "./storage.js";
import { sweepExpired } from "./sweeper.js";
import { validateLinkForm, type LinkForm } from "./validate_link.js";
import { renderLandingPage, renderPreviewPage, type LandingPageModel } from "./views.js";

const HTML = "text/html; charset=utf-8";
const TEXT = "text/plain; charset=utf-8";
const MAX_CREATED_LENGTH = 64;

/**
 * Stored URLs are free text; anything outside printable ASCII is percent-encoded
 * (UTF-8) so the Location header is always legal.
 */
export function toLocationHeader(longUrl: string): string {
  return longUrl.replace(/[^\x21-\x7e]/gu, encodeURIComponent);
}

export interface AppOptions {
  store: UrlStore;
  config: Pick<Config, "baseUrl" | "bodyLimitBytes" | "codeLength" | "recentLimit">;
  logger?: FastifyServerOptions["logger"];
  buildInfo?: Record<string, string>;
  clock?: () => Date;
}

function errorLabel(statusCode: number): string {
  if (statusCode >= 500) return "internal_error";
  if (statusCode === 404) return "not_found";
  if (statusCode === 413) return "payload_too_large";
  if (statusCode === 415) return "unsupported_media_type";
  return "bad_request";
}

export function buildApp({
  store,
  config,
  logger = false,
  buildInfo = {},
  clock = () => new Date()
}: AppOptions): FastifyInstance {
  const app = Fastify({
    logger,
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
  });

  app.addHook("onResponse", async (req, reply) => {
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };

    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, reply.elapsedTime / 1000);
  });

  app.addHook("onClose", async () => {
    await store.close();
  });

  app.register(helmet, {
    contentSecurityPolicy: false
  });
  app.register(formbody);

  // Short URLs follow whatever origin the visitor used unless BASE_URL pins one
  const originOf = (req: FastifyRequest): string => config.baseUrl ?? `${req.protocol}://${req.host}`;

  async function sendLanding(
    reply: FastifyReply,
    statusCode: number,
    model: Omit<LandingPageModel, "links">
  ): Promise<FastifyReply> {
    const links = await store.listRecent(config.recentLimit);
    return reply
      .code(statusCode)
      .type(HTML)
      .send(renderLandingPage({ links, ...model }));
  }

  app.get("/health", async () => {
    return { status: "ok", ...buildInfo };
  });

  app.get("/ready", async (req, reply) => {
    try {
      await store.ping();
    } catch (err) {
      req.log.error({ err }, "store ping failed");
      return reply.code(503).send({ status: "unavailable" });
    }
    return { status: "ready" };
  });

  app.get("/metrics", async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      reply.code(500).send("metrics_error");
    }
  });

  app.get<{ Querystring: { created?: string } }>(
    "/",
    {
      schema: {
        querystring: {
          type: "object",
          properties: { created: { type: "string" } }
        }
      }
    },
    async (req, reply) => {
      await sweepExpired(store, clock(), req.log);

      const { created } = req.query;
      const shortUrl =
        created && created.length <= MAX_CREATED_LENGTH ? `${originOf(req)}/${created}` : undefined;
      return sendLanding(reply, 200, { shortUrl });
    }
  );

  app.post<{ Body: LinkForm }>(
    "/",
    {
      attachValidation: true,
      schema: {
        body: {
          type: "object",
          properties: {
            long_url: { type: "string" },
            custom_code: { type: "string" },
            expiration_date: { type: "string" }
          }
        }
      }
    },
    async (req, reply) => {
      await sweepExpired(store, clock(), req.log);

      if (req.validationError) {
        return sendLanding(reply, 400, { error: "Invalid form submission." });
      }

      const form = req.body ?? {};
      const res = validateLinkForm(form);
      if (!res.ok) {
        return sendLanding(reply, 400, { error: res.error, form });
      }

      try {
        const link = await createLink(store, res.value, { codeLength: config.codeLength });
        shortLinksCreatedTotal.inc({ code_source: res.value.customCode ? "custom" : "generated" });
        req.log.info({ shortCode: link.shortCode, linkId: link.id }, "short link created");
        return reply.redirect(`/?created=${encodeURIComponent(link.shortCode)}`);
      } catch (e) {
        if (e instanceof DuplicateCodeError) {
          return sendLanding(reply, 409, { error: "Custom code already exists.", form });
        }
        if (e instanceof CodeGenerationError) {
          req.log.warn({ attempts: e.attempts }, "short code space congested");
          return sendLanding(reply, 503, { error: "Could not allocate a short code, please try again.", form });
        }
        throw e;
      }
    }
  );

  app.post<{ Body: { short_code: string } }>(
    "/delete",
    {
      attachValidation: true,
      schema: {
        body: {
          type: "object",
          required: ["short_code"],
          properties: { short_code: { type: "string", minLength: 1 } }
        }
      }
    },
    async (req, reply) => {
      // nothing to delete, but the form flow still lands back home
      if (req.validationError) return reply.redirect("/");

      const shortCode = req.body.short_code;
      const removed = await store.delete(shortCode);
      if (removed) req.log.info({ shortCode }, "short link deleted");
      return reply.redirect("/");
    }
  );

  // HEAD is not exposed so only a real GET counts as a click
  app.get<{ Params: { code: string } }>("/:code", { exposeHeadRoute: false }, async (req, reply) => {
    const result = await resolveLink(store, req.params.code, { now: clock(), log: req.log });
    shortLinkResolutionsTotal.inc({ outcome: result.kind });

    switch (result.kind) {
      case "not_found":
        return reply.code(404).type(TEXT).send("URL not found");
      case "preview":
        return reply.type(HTML).send(renderPreviewPage(result.link));
      case "redirect":
        return reply.redirect(toLocationHeader(result.longUrl));
    }
  });

  // Paths that are not a single segment cannot name a link either
  app.setNotFoundHandler((_req, reply) => {
    return reply.code(404).type(TEXT).send("URL not found");
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const statusCode = err.validation ? 400 : err.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error({ err }, "request failed");
    } else {
      req.log.info({ err: err.message, statusCode }, "request rejected");
    }

    return reply.code(statusCode).send({ error: errorLabel(statusCode) });
  });

  return app;
}
