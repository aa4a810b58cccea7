import type { FastifyReply, FastifyRequest } from "fastify";
import type { AppConfig } from "../config/runtime";
import { formValues, type FormValues } from "../orders/forms";
import { storeFor, type CsvOrderStore, type DataMode, type OrderStores } from "../orders/store";

export interface ControllerOptions {
  stores: OrderStores;
  display: AppConfig["display"];
  /** Current date as YYYY-MM-DD */
  today: () => string;
}

export interface RequestContext {
  mode: DataMode;
  query: FormValues;
  store: CsvOrderStore;
}

/**
 * Data mode, flattened query and store for a request. `?test=1` selects the
 * sample table.
 */
export function requestContext(
  request: Pick<FastifyRequest, "query">,
  stores: OrderStores,
): RequestContext {
  const query = formValues(request.query);
  const mode: DataMode = query.test === "1" ? "test" : "live";
  return { mode, query, store: storeFor(stores, mode) };
}

export function sendHtml(reply: FastifyReply, html: string, statusCode = 200): FastifyReply {
  return reply.code(statusCode).header("Content-Type", "text/html; charset=utf-8").send(html);
}

export function sendAttachment(
  reply: FastifyReply,
  filename: string,
  contentType: string,
  body: string | Buffer,
): FastifyReply {
  return reply
    .header("Content-Type", contentType)
    .header("Content-Disposition", `attachment; filename="${filename}"`)
    .send(body);
}
