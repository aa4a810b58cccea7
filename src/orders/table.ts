import { OrderNotFoundError } from "../errors";
import type { Order, OrderRow } from "./model";

export type OrderTable = readonly Order[];

export interface OrderFilter {
  /** Inclusive lower bound, YYYY-MM-DD */
  from?: string;
  /** Inclusive upper bound, YYYY-MM-DD */
  to?: string;
  orderStatus?: string;
  paymentStatus?: string;
  /** Case-insensitive match on customer name, number or order text */
  search?: string;
}

function indexOf(table: OrderTable, id: number): number {
  if (!Number.isInteger(id) || id < 1 || id > table.length) {
    throw new OrderNotFoundError(id);
  }
  return id - 1;
}

export function toRows(table: OrderTable): OrderRow[] {
  return table.map((order, index) => ({ id: index + 1, order }));
}

export function getOrder(table: OrderTable, id: number): Order {
  return table[indexOf(table, id)];
}

export function appendOrders(table: OrderTable, orders: readonly Order[]): Order[] {
  return [...table, ...orders];
}

export function replaceOrder(table: OrderTable, id: number, order: Order): Order[] {
  const index = indexOf(table, id);
  return table.map((existing, position) => (position === index ? order : existing));
}

export function removeOrder(table: OrderTable, id: number): Order[] {
  const index = indexOf(table, id);
  return table.filter((_, position) => position !== index);
}

/**
 * Rows matching every given criterion. Ids are the rows' positions in the
 * unfiltered table so they stay valid for edit and delete.
 */
export function filterOrders(
  table: OrderTable,
  filter: OrderFilter,
  today: string,
): OrderRow[] {
  const search = filter.search?.trim().toLowerCase();

  return toRows(table).filter(({ order }) => {
    const date = order.date ?? today;
    if (filter.from && date < filter.from) return false;
    if (filter.to && date > filter.to) return false;
    if (filter.orderStatus && order.orderStatus.trim() !== filter.orderStatus) {
      return false;
    }
    if (filter.paymentStatus && order.paymentStatus.trim() !== filter.paymentStatus) {
      return false;
    }
    if (search) {
      const haystack = [order.customerName, order.number, order.order]
        .join("\n")
        .toLowerCase();
      if (!haystack.includes(search)) return false;
    }
    return true;
  });
}
