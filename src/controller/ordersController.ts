import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { FormValidationError } from "../errors";
import { CSV_MIME, XLSX_MIME, encodeCsv, encodeXlsx } from "../orders/codec";
import {
  addFormDefaults,
  editFormValues,
  formValues,
  parseAddOrderForm,
  parseEditOrderForm,
  parseOrderFilter,
} from "../orders/forms";
import { filterOrders, getOrder, toRows } from "../orders/table";
import { renderAddOrderPage } from "../views/add-order-page";
import { renderEditOrderPage } from "../views/edit-order-page";
import { noticeFor, withMode } from "../views/links";
import { renderOrdersPage } from "../views/orders-page";
import {
  requestContext,
  sendAttachment,
  sendHtml,
  type ControllerOptions,
} from "./context";

interface OrderParams {
  id: string;
}

export default async function ordersController(
  fastify: FastifyInstance,
  options: ControllerOptions,
) {
  const { stores, today } = options;

  // GET /orders/new
  fastify.get("/new", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, query } = requestContext(request, stores);
    return sendHtml(
      reply,
      renderAddOrderPage({ mode, values: addFormDefaults(), notice: noticeFor(query.notice) }),
    );
  });

  // POST /orders
  fastify.post("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, store } = requestContext(request, stores);
    const values = formValues(request.body);

    try {
      const order = parseAddOrderForm(values, today());
      await store.add(order);
    } catch (error) {
      if (error instanceof FormValidationError) {
        return sendHtml(
          reply,
          renderAddOrderPage({
            mode,
            values: { ...addFormDefaults(), ...values },
            problem: { message: error.message, fields: error.fields },
          }),
          error.statusCode,
        );
      }
      throw error;
    }
    return reply.redirect(withMode("/orders/new", mode, { notice: "added" }), 303);
  });

  // GET /orders/edit?id=1
  fastify.get("/edit", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, query, store } = requestContext(request, stores);
    const table = await store.load();
    const notice = noticeFor(query.notice);

    if (table.length === 0) {
      return sendHtml(reply, renderEditOrderPage({ mode, rows: [], values: {}, notice }));
    }
    const selected = query.id === undefined || query.id === "" ? 1 : Number(query.id);
    const order = getOrder(table, selected);

    return sendHtml(
      reply,
      renderEditOrderPage({
        mode,
        rows: toRows(table),
        selected,
        values: editFormValues(order, today()),
        notice,
      }),
    );
  });

  // POST /orders/:id with action=save|delete
  fastify.post(
    "/:id",
    async function (
      request: FastifyRequest<{ Params: OrderParams }>,
      reply: FastifyReply,
    ) {
      const { mode, store } = requestContext(request, stores);
      const id = Number(request.params.id);
      const table = await store.load();
      getOrder(table, id);
      const values = formValues(request.body);

      // Deleting does not need the rest of the form to be valid
      if (values.action === "delete") {
        await store.remove(id);
        return reply.redirect(withMode("/orders/edit", mode, { notice: "deleted" }), 303);
      }

      try {
        const { order } = parseEditOrderForm(values);
        await store.update(id, order);
      } catch (error) {
        if (error instanceof FormValidationError) {
          return sendHtml(
            reply,
            renderEditOrderPage({
              mode,
              rows: toRows(table),
              selected: id,
              values,
              problem: { message: error.message, fields: error.fields },
            }),
            error.statusCode,
          );
        }
        throw error;
      }
      return reply.redirect(withMode("/orders/edit", mode, { id, notice: "updated" }), 303);
    },
  );

  // GET /orders?from=&to=&status=&payment=&q=
  fastify.get("/", async function (request: FastifyRequest, reply: FastifyReply) {
    const { mode, query, store } = requestContext(request, stores);
    const filter = parseOrderFilter(query);
    const table = await store.load();

    return sendHtml(
      reply,
      renderOrdersPage({
        mode,
        rows: filterOrders(table, filter, today()),
        total: table.length,
        filter,
        notice: noticeFor(query.notice),
      }),
    );
  });

  // GET /orders/export.csv
  fastify.get("/export.csv", async function (request: FastifyRequest, reply: FastifyReply) {
    const { store } = requestContext(request, stores);
    return sendAttachment(
      reply,
      "orders.csv",
      `${CSV_MIME}; charset=utf-8`,
      encodeCsv(await store.load()),
    );
  });

  // GET /orders/export.xlsx
  fastify.get("/export.xlsx", async function (request: FastifyRequest, reply: FastifyReply) {
    const { store } = requestContext(request, stores);
    return sendAttachment(reply, "orders.xlsx", XLSX_MIME, encodeXlsx(await store.load()));
  });
}
