import { expect } from "chai";
import {
  describeInsights,
  describeTotals,
  formatMoney,
  formatQuantity,
} from "../src/dashboard/format";
import {
  bestSellingItem,
  dashboardInsights,
  dashboardTotals,
  monthlySummary,
  summarize,
} from "../src/dashboard/summary";
import { makeOrder, sampleTable } from "./fixtures";

const today = "2025-03-15";

describe("dashboard summary", () => {
  it("groups by month in ascending order", () => {
    const shuffled = [...sampleTable()].reverse();
    expect(monthlySummary(shuffled, today)).to.deep.equal([
      { month: "2025-01", profit: 550, totalOrders: 2, quantity: 3 },
      { month: "2025-02", profit: 350, totalOrders: 2, quantity: 4 },
      { month: "2025-03", profit: 100, totalOrders: 1, quantity: 4 },
    ]);
  });

  it("buckets undated rows into the current month and skips blank orders", () => {
    const table = [
      makeOrder({ date: null, profit: 10, quantity: 1 }),
      makeOrder({ date: "2025-03-02", order: " ", profit: null, quantity: null }),
    ];
    expect(monthlySummary(table, today)).to.deep.equal([
      { month: "2025-03", profit: 10, totalOrders: 1, quantity: 1 },
    ]);
  });

  it("totals the whole table", () => {
    expect(dashboardTotals(sampleTable())).to.deep.equal({
      totalOrders: 5,
      totalQuantity: 11,
      totalSales: 2400,
      totalProfit: 1000,
    });
  });

  it("finds the best month and best-selling product", () => {
    const table = sampleTable();
    expect(dashboardInsights(table, monthlySummary(table, today))).to.deep.equal({
      mostOrdersMonth: "2025-01",
      bestSellingItem: "Home Jersey",
      bestSellerAveragePrice: 650,
      bestMonthQuantity: 3,
      bestMonthProfit: 550,
    });
  });

  it("breaks best-seller ties by first appearance", () => {
    const table = [makeOrder({ order: "Scarf" }), makeOrder({ order: "Cap" })];
    expect(bestSellingItem(table)).to.equal("Scarf");
    expect(bestSellingItem([makeOrder({ order: "" })])).to.equal(null);
  });

  it("has no insights for an empty table", () => {
    const summary = summarize([], today);
    expect(summary.monthly).to.deep.equal([]);
    expect(summary.insights).to.equal(null);
    expect(summary.totals.totalOrders).to.equal(0);
  });

  it("restricts everything to a date range", () => {
    const summary = summarize(sampleTable(), today, { from: "2025-02-01" });
    expect(summary.totals.totalOrders).to.equal(3);
    expect(summary.monthly.map((month) => month.month)).to.deep.equal(["2025-02", "2025-03"]);
    expect(summary.insights).to.deep.equal({
      mostOrdersMonth: "2025-02",
      bestSellingItem: "Scarf",
      bestSellerAveragePrice: 225,
      bestMonthQuantity: 4,
      bestMonthProfit: 350,
    });
  });
});

describe("dashboard formatting", () => {
  it("formats money with separators and two decimals", () => {
    expect(formatMoney(1234.5, "₹")).to.equal("₹1,234.50");
    expect(formatMoney(0, "Rs. ")).to.equal("Rs. 0.00");
    expect(formatMoney(-5, "₹")).to.equal("₹-5.00");
  });

  it("formats quantities without grouping", () => {
    expect(formatQuantity(11)).to.equal("11");
    expect(formatQuantity(2.5)).to.equal("2.5");
    expect(formatQuantity(12345)).to.equal("12345");
  });

  it("labels totals and insights", () => {
    const table = sampleTable();
    const summary = summarize(table, today);
    expect(describeTotals(summary.totals, "₹")).to.deep.equal([
      { label: "Total Orders", value: "5" },
      { label: "Total Quantity Ordered", value: "11" },
      { label: "Total Sales", value: "₹2,400.00" },
      { label: "Total Profit", value: "₹1,000.00" },
    ]);
    expect(summary.insights).to.not.equal(null);
    if (summary.insights) {
      expect(describeInsights(summary.insights, "₹")).to.deep.equal([
        { label: "Month with Most Sales", value: "2025-01" },
        { label: "Best-Selling Product", value: "Home Jersey" },
        { label: "Average Sale Price of Best-Seller", value: "₹650.00" },
        { label: "Total Quantity Sold in Best Month", value: "3" },
        { label: "Total Profit in Best Month", value: "₹550.00" },
      ]);
    }
  });
});
