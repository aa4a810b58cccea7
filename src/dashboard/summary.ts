import type { Order } from "../orders/model";
import { filterOrders, type OrderTable } from "../orders/table";
import { monthOf } from "../utils/dates";
import { meanOf, sumOf } from "../utils/values";

export interface MonthlySummary {
  /** YYYY-MM */
  month: string;
  profit: number;
  /** Rows with a non-empty order name */
  totalOrders: number;
  quantity: number;
}

export interface DashboardTotals {
  totalOrders: number;
  totalQuantity: number;
  totalSales: number;
  totalProfit: number;
}

export interface DashboardInsights {
  mostOrdersMonth: string;
  /** null when no row names a product */
  bestSellingItem: string | null;
  /** null when the best-seller has no sale price on record */
  bestSellerAveragePrice: number | null;
  bestMonthQuantity: number;
  bestMonthProfit: number;
}

export interface DashboardSummary {
  totals: DashboardTotals;
  monthly: MonthlySummary[];
  insights: DashboardInsights | null;
}

export interface DateRange {
  from?: string;
  to?: string;
}

export function monthlySummary(orders: OrderTable, today: string): MonthlySummary[] {
  const buckets = new Map<string, Order[]>();
  for (const order of orders) {
    const month = monthOf(order.date ?? today);
    const bucket = buckets.get(month);
    if (bucket) {
      bucket.push(order);
    } else {
      buckets.set(month, [order]);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, rows]) => ({
      month,
      profit: sumOf(rows.map((row) => row.profit)),
      totalOrders: rows.filter((row) => row.order.trim() !== "").length,
      quantity: sumOf(rows.map((row) => row.quantity)),
    }));
}

export function dashboardTotals(orders: OrderTable): DashboardTotals {
  return {
    totalOrders: orders.length,
    totalQuantity: sumOf(orders.map((order) => order.quantity)),
    totalSales: sumOf(orders.map((order) => order.salePrice)),
    totalProfit: sumOf(orders.map((order) => order.profit)),
  };
}

/**
 * Most frequent order name; ties go to the name seen first.
 */
export function bestSellingItem(orders: OrderTable): string | null {
  const counts = new Map<string, number>();
  for (const order of orders) {
    if (order.order.trim() === "") continue;
    counts.set(order.order, (counts.get(order.order) ?? 0) + 1);
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [name, count] of counts) {
    if (count > bestCount) {
      best = name;
      bestCount = count;
    }
  }
  return best;
}

export function dashboardInsights(
  orders: OrderTable,
  monthly: readonly MonthlySummary[],
): DashboardInsights | null {
  // First month wins ties, matching the ascending month order
  const bestMonth = monthly.reduce<MonthlySummary | null>(
    (best, month) => (best === null || month.totalOrders > best.totalOrders ? month : best),
    null,
  );
  if (bestMonth === null) {
    return null;
  }

  const item = bestSellingItem(orders);
  return {
    mostOrdersMonth: bestMonth.month,
    bestSellingItem: item,
    bestSellerAveragePrice:
      item === null ? null : (
        meanOf(orders.filter((order) => order.order === item).map((order) => order.salePrice))
      ),
    bestMonthQuantity: bestMonth.quantity,
    bestMonthProfit: bestMonth.profit,
  };
}

/**
 * Everything the dashboard shows, computed over the rows dated inside
 * `range` (inclusive). Rows without a date count as dated `today`.
 */
export function summarize(
  orders: OrderTable,
  today: string,
  range: DateRange = {},
): DashboardSummary {
  const selected =
    range.from || range.to ?
      filterOrders(orders, range, today).map((row) => row.order)
    : [...orders];
  const monthly = monthlySummary(selected, today);

  return {
    totals: dashboardTotals(selected),
    monthly,
    insights: dashboardInsights(selected, monthly),
  };
}
