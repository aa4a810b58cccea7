export const ORDER_STATUSES = [
  "Pending",
  "In Production",
  "Shipped",
  "Delivered",
  "Cancelled",
] as const;

export const PAYMENT_STATUSES = ["Unpaid", "Partially Paid", "Paid"] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/**
 * One row of the order table. Numeric cells and the date may be absent
 * (`null`) because the table is hand-editable and imported from spreadsheets.
 */
export interface Order {
  customerName: string;
  number: string;
  /** Product name(s); several products are joined with "; " */
  order: string;
  quantity: number | null;
  nameset: string;
  costPrice: number | null;
  salePrice: number | null;
  profit: number | null;
  /** Free text in the file; forms restrict it to ORDER_STATUSES */
  orderStatus: string;
  paymentStatus: string;
  trackingDetail: string;
  /** YYYY-MM-DD */
  date: string | null;
}

/** An order together with its 1-based position in the table. */
export interface OrderRow {
  id: number;
  order: Order;
}

export interface OrderColumn {
  header: string;
  key: keyof Order;
  numeric: boolean;
}

export const ORDER_COLUMNS: readonly OrderColumn[] = [
  { header: "Customer Name", key: "customerName", numeric: false },
  { header: "Number", key: "number", numeric: false },
  { header: "Order", key: "order", numeric: false },
  { header: "Quantity", key: "quantity", numeric: true },
  { header: "Nameset", key: "nameset", numeric: false },
  { header: "Cost Price", key: "costPrice", numeric: true },
  { header: "Sale Price", key: "salePrice", numeric: true },
  { header: "Profit", key: "profit", numeric: true },
  { header: "Order Status", key: "orderStatus", numeric: false },
  { header: "Payment Status", key: "paymentStatus", numeric: false },
  { header: "Tracking Detail", key: "trackingDetail", numeric: false },
  { header: "Date", key: "date", numeric: false },
];

export const ORDER_HEADERS: readonly string[] = ORDER_COLUMNS.map(
  (column) => column.header,
);

/** Header of files written before orders carried a date. */
export const LEGACY_ORDER_HEADERS: readonly string[] = ORDER_HEADERS.filter(
  (header) => header !== "Date",
);

export function computeProfit(
  costPrice: number | null,
  salePrice: number | null,
): number | null {
  if (costPrice === null || salePrice === null) return null;
  // Two-decimal prices; keep float noise like 0.30000000000000004 out of the file
  return Math.round((salePrice - costPrice) * 1e6) / 1e6;
}

export function statusIndex<T extends string>(
  options: readonly T[],
  value: string,
): number {
  const index = options.findIndex((option) => option === value.trim());
  return index === -1 ? 0 : index;
}

/**
 * Splits the free-text "Order Name(s)" field on newlines and commas, dropping
 * blanks.
 */
export function splitOrderNames(input: string): string[] {
  return input
    .replace(/\r?\n/g, ",")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
