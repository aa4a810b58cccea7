import { z } from "zod";
import { FormValidationError } from "../errors";
import { isValidDate } from "../utils/dates";
import { formatCell, safeFloat, safeInt } from "../utils/values";
import {
  ORDER_STATUSES,
  PAYMENT_STATUSES,
  computeProfit,
  splitOrderNames,
  statusIndex,
  type Order,
} from "./model";
import type { OrderFilter } from "./table";

export const REQUIRED_FIELDS_MESSAGE = "Please fill in required fields.";

/** Raw form state, keyed by input name, as posted or as prefilled. */
export type FormValues = Record<string, string>;

const text = z.string().default("");

const isoDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
  .refine((value) => {
    const [year, month, day] = value.split("-").map(Number);
    return isValidDate(year, month, day);
  }, "Not a calendar date");

export const AddOrderFormSchema = z.object({
  customerName: text,
  number: text,
  orders: text,
  quantity: z.coerce.number().int().min(1),
  nameset: text,
  costPrice: z.coerce.number().min(0),
  salePrice: z.coerce.number().min(0),
  orderStatus: z.enum(ORDER_STATUSES),
  paymentStatus: z.enum(PAYMENT_STATUSES),
  trackingDetail: text,
});

export const EditOrderFormSchema = z.object({
  customerName: text,
  number: text,
  order: text,
  quantity: z.coerce.number().int(),
  nameset: text,
  costPrice: z.coerce.number(),
  salePrice: z.coerce.number(),
  orderStatus: z.enum(ORDER_STATUSES),
  paymentStatus: z.enum(PAYMENT_STATUSES),
  trackingDetail: text,
  date: isoDate,
  action: z.enum(["save", "delete"]).default("save"),
});

export type AddOrderForm = z.infer<typeof AddOrderFormSchema>;
export type EditOrderForm = z.infer<typeof EditOrderFormSchema>;

/**
 * Flattens a urlencoded body into single string values. Repeated keys keep
 * their first value; non-string values are dropped.
 */
export function formValues(body: unknown): FormValues {
  const values: FormValues = {};
  if (typeof body !== "object" || body === null) {
    return values;
  }
  for (const [key, raw] of Object.entries(body)) {
    const value: unknown = Array.isArray(raw) ? raw[0] : raw;
    if (typeof value === "string") {
      values[key] = value;
    }
  }
  return values;
}

function invalid(error: z.ZodError): FormValidationError {
  const fields = [...new Set(error.issues.map((issue) => String(issue.path[0])))];
  return new FormValidationError(`Invalid value for: ${fields.join(", ")}`, fields);
}

/**
 * Validates the "Add New Order" form. Customer name, contact number and at
 * least one order name are required; the order is dated `today`.
 */
export function parseAddOrderForm(values: FormValues, today: string): Order {
  const result = AddOrderFormSchema.safeParse(values);
  if (!result.success) {
    throw invalid(result.error);
  }
  const form = result.data;
  const names = splitOrderNames(form.orders);

  const missing = [
    form.customerName.trim() === "" ? "customerName" : null,
    form.number.trim() === "" ? "number" : null,
    names.length === 0 ? "orders" : null,
  ].filter((field): field is string => field !== null);
  if (missing.length > 0) {
    throw new FormValidationError(REQUIRED_FIELDS_MESSAGE, missing);
  }

  return {
    customerName: form.customerName.trim(),
    number: form.number.trim(),
    order: names.join("; "),
    quantity: form.quantity,
    nameset: form.nameset,
    costPrice: form.costPrice,
    salePrice: form.salePrice,
    profit: computeProfit(form.costPrice, form.salePrice),
    orderStatus: form.orderStatus,
    paymentStatus: form.paymentStatus,
    trackingDetail: form.trackingDetail,
    date: today,
  };
}

export function parseEditOrderForm(values: FormValues): {
  action: EditOrderForm["action"];
  order: Order;
} {
  const result = EditOrderFormSchema.safeParse(values);
  if (!result.success) {
    throw invalid(result.error);
  }
  const form = result.data;

  return {
    action: form.action,
    order: {
      customerName: form.customerName,
      number: form.number,
      order: form.order,
      quantity: form.quantity,
      nameset: form.nameset,
      costPrice: form.costPrice,
      salePrice: form.salePrice,
      profit: computeProfit(form.costPrice, form.salePrice),
      orderStatus: form.orderStatus,
      paymentStatus: form.paymentStatus,
      trackingDetail: form.trackingDetail,
      date: form.date,
    },
  };
}

export function addFormDefaults(): FormValues {
  return {
    customerName: "",
    number: "",
    orders: "",
    quantity: "1",
    nameset: "",
    costPrice: "0",
    salePrice: "0",
    orderStatus: ORDER_STATUSES[0],
    paymentStatus: PAYMENT_STATUSES[0],
    trackingDetail: "",
  };
}

/**
 * Prefills the edit form from a stored row. Absent numbers fall back to a
 * quantity of 1 and prices of 0; unknown statuses select the first option.
 */
export function editFormValues(order: Order, today: string): FormValues {
  return {
    customerName: order.customerName,
    number: order.number,
    order: order.order,
    quantity: String(safeInt(order.quantity, 1)),
    nameset: order.nameset,
    costPrice: formatCell(safeFloat(order.costPrice, 0)),
    salePrice: formatCell(safeFloat(order.salePrice, 0)),
    orderStatus: ORDER_STATUSES[statusIndex(ORDER_STATUSES, order.orderStatus)],
    paymentStatus: PAYMENT_STATUSES[statusIndex(PAYMENT_STATUSES, order.paymentStatus)],
    trackingDetail: order.trackingDetail,
    date: order.date ?? today,
  };
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === "" ? undefined : value));

const optionalDate = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === "" ? undefined : value))
  .pipe(isoDate.optional());

export const DateRangeQuerySchema = z.object({
  from: optionalDate,
  to: optionalDate,
});

export const OrderFilterQuerySchema = DateRangeQuerySchema.extend({
  status: optionalText.pipe(z.enum(ORDER_STATUSES).optional()),
  payment: optionalText.pipe(z.enum(PAYMENT_STATUSES).optional()),
  q: optionalText,
});

/** Inclusive `from`/`to` query values; blanks mean unbounded. */
export function parseDateRange(values: FormValues): { from?: string; to?: string } {
  const result = DateRangeQuerySchema.safeParse(values);
  if (!result.success) {
    throw invalid(result.error);
  }
  return result.data;
}

export function parseOrderFilter(values: FormValues): OrderFilter {
  const result = OrderFilterQuerySchema.safeParse(values);
  if (!result.success) {
    throw invalid(result.error);
  }
  const { from, to, status, payment, q } = result.data;
  return { from, to, orderStatus: status, paymentStatus: payment, search: q };
}
