import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import formbody from "@fastify/formbody";
import multipart from "@fastify/multipart";
import type { AppConfig } from "./config/runtime";
import { requestContext, sendHtml } from "./controller/context";
import { OrderFlowError } from "./errors";
import { loggerOptions } from "./logger";
import { CsvOrderStore, type OrderStores } from "./orders/store";
import router from "./router";
import { toIsoDate } from "./utils/dates";
import { renderErrorPage } from "./views/error-page";

/** Largest accepted import upload, in bytes */
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export interface BuildServerOptions {
  config: AppConfig;
  /** Source of "today"; tests pin it */
  clock?: () => Date;
}

function statusOf(error: FastifyError): number {
  if (error instanceof OrderFlowError) return error.statusCode;
  const status = error.statusCode;
  return status !== undefined && status >= 400 && status < 600 ? status : 500;
}

export async function buildServer({
  config,
  clock = () => new Date(),
}: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions(config.logging.level),
    // Confirming an import re-posts the previewed rows urlencoded, which inflates them
    bodyLimit: 3 * MAX_UPLOAD_BYTES,
  });

  const stores: OrderStores = {
    live: new CsvOrderStore(config.storage.dataFile, fastify.log.child({ module: "store" })),
    sample: new CsvOrderStore(
      config.storage.testDataFile,
      fastify.log.child({ module: "store", mode: "test" }),
    ),
  };
  await stores.live.init();
  await stores.sample.init();

  await fastify.register(formbody);
  await fastify.register(multipart, {
    limits: { files: 1, fileSize: MAX_UPLOAD_BYTES },
    throwFileSizeLimit: true,
  });

  fastify.setErrorHandler(function (error: FastifyError, request, reply) {
    const { mode } = requestContext(request, stores);
    const statusCode = statusOf(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    } else {
      request.log.info({ err: error, statusCode }, "Request rejected");
    }
    const message =
      error instanceof OrderFlowError || statusCode < 500 ?
        error.message
      : "An unexpected error occurred.";
    return sendHtml(reply, renderErrorPage({ mode, statusCode, message }), statusCode);
  });

  fastify.setNotFoundHandler(function (request, reply) {
    const { mode } = requestContext(request, stores);
    return sendHtml(
      reply,
      renderErrorPage({ mode, statusCode: 404, message: `No page at ${request.url}` }),
      404,
    );
  });

  await fastify.register(router, {
    stores,
    display: config.display,
    today: () => toIsoDate(clock()),
  });

  return fastify;
}
