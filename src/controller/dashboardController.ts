import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { renderDashboardPdf } from "../dashboard/pdf";
import { summarize } from "../dashboard/summary";
import { parseDateRange } from "../orders/forms";
import { renderDashboardPage } from "../views/dashboard-page";
import {
  requestContext,
  sendAttachment,
  sendHtml,
  type ControllerOptions,
} from "./context";

export default async function dashboardController(
  fastify: FastifyInstance,
  options: ControllerOptions,
) {
  const { stores, display, today } = options;

  // GET /dashboard?from=&to=
  fastify.get("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, query, store } = requestContext(request, stores);
    const range = parseDateRange(query);
    const summary = summarize(await store.load(), today(), range);

    return sendHtml(
      reply,
      renderDashboardPage({ mode, summary, range, currencySymbol: display.currencySymbol }),
    );
  });

  // GET /dashboard/report.pdf
  fastify.get("/report.pdf", async function (request: FastifyRequest, reply: FastifyReply) {
    const { query, store } = requestContext(request, stores);
    const range = parseDateRange(query);
    const summary = summarize(await store.load(), today(), range);
    const pdf = await renderDashboardPdf(summary, {
      currencySymbol: display.pdfCurrencySymbol,
      generatedOn: today(),
    });
    request.log.debug({ bytes: pdf.length }, "Rendered dashboard report");

    return sendAttachment(reply, "order_dashboard.pdf", "application/pdf", pdf);
  });
}
