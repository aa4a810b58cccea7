import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { ImportError } from "../errors";
import { CSV_MIME, decodeCsv, decodeUpload, encodeCsv, templateCsv } from "../orders/codec";
import { formValues } from "../orders/forms";
import { renderImportPage } from "../views/import-page";
import { noticeFor, withMode } from "../views/links";
import {
  requestContext,
  sendAttachment,
  sendHtml,
  type ControllerOptions,
} from "./context";

export const NO_FILE_MESSAGE = "Please choose a CSV or Excel file to upload.";

export default async function importController(
  fastify: FastifyInstance,
  options: ControllerOptions,
) {
  const { stores } = options;

  // GET /import
  fastify.get("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, query } = requestContext(request, stores);
    return sendHtml(reply, renderImportPage({ mode, notice: noticeFor(query.notice) }));
  });

  // POST /import/preview (multipart, field "file")
  fastify.post("/preview", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode } = requestContext(request, stores);
    const file = await request.file();
    if (!file || file.filename === "") {
      return sendHtml(reply, renderImportPage({ mode, error: NO_FILE_MESSAGE }), 400);
    }

    try {
      const orders = decodeUpload(file.filename, await file.toBuffer());
      return sendHtml(
        reply,
        renderImportPage({
          mode,
          preview: { filename: file.filename, orders, payload: encodeCsv(orders) },
        }),
      );
    } catch (error) {
      if (error instanceof ImportError) {
        request.log.warn({ err: error, file: file.filename }, "Rejected import file");
        return sendHtml(reply, renderImportPage({ mode, error: error.message }), error.statusCode);
      }
      throw error;
    }
  });

  // POST /import with the previewed rows as CSV in "payload"
  fastify.post("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, store } = requestContext(request, stores);
    const { payload = "" } = formValues(request.body);

    try {
      const orders = decodeCsv(payload);
      await store.importOrders(orders);
    } catch (error) {
      if (error instanceof ImportError) {
        return sendHtml(reply, renderImportPage({ mode, error: error.message }), error.statusCode);
      }
      throw error;
    }
    return reply.redirect(withMode("/import", mode, { notice: "imported" }), 303);
  });

  // GET /import/template.csv
  fastify.get("/template.csv", async function (_request: FastifyRequest, reply: FastifyReply) {
    return sendAttachment(reply, "order_template.csv", `${CSV_MIME}; charset=utf-8`, templateCsv());
  });
}
