import type { DashboardInsights, DashboardTotals } from "./summary";

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const plain = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 6,
  useGrouping: false,
});

/**
 * Formats a number as money with thousands separators and two decimals.
 * @param symbol - Prefix such as "₹" or "Rs. "
 * @returns e.g. "₹1,234.50"; negative values keep the sign after the symbol
 */
export function formatMoney(value: number, symbol: string): string {
  return `${symbol}${twoDecimals.format(value)}`;
}

/**
 * Formats a quantity without grouping, dropping a trailing ".0".
 */
export function formatQuantity(value: number): string {
  return plain.format(value);
}

export interface LabelledValue {
  label: string;
  value: string;
}

export function describeTotals(
  totals: DashboardTotals,
  symbol: string,
): LabelledValue[] {
  return [
    { label: "Total Orders", value: String(totals.totalOrders) },
    { label: "Total Quantity Ordered", value: formatQuantity(totals.totalQuantity) },
    { label: "Total Sales", value: formatMoney(totals.totalSales, symbol) },
    { label: "Total Profit", value: formatMoney(totals.totalProfit, symbol) },
  ];
}

export function describeInsights(
  insights: DashboardInsights,
  symbol: string,
): LabelledValue[] {
  return [
    { label: "Month with Most Sales", value: insights.mostOrdersMonth },
    { label: "Best-Selling Product", value: insights.bestSellingItem ?? "n/a" },
    {
      label: "Average Sale Price of Best-Seller",
      value:
        insights.bestSellerAveragePrice === null ?
          "n/a"
        : formatMoney(insights.bestSellerAveragePrice, symbol),
    },
    {
      label: "Total Quantity Sold in Best Month",
      value: formatQuantity(insights.bestMonthQuantity),
    },
    {
      label: "Total Profit in Best Month",
      value: formatMoney(insights.bestMonthProfit, symbol),
    },
  ];
}
