import { expect } from "chai";
import { OrderNotFoundError } from "../src/errors";
import { computeProfit, splitOrderNames, statusIndex, ORDER_STATUSES } from "../src/orders/model";
import {
  appendOrders,
  filterOrders,
  getOrder,
  removeOrder,
  replaceOrder,
  toRows,
} from "../src/orders/table";
import { makeOrder, sampleTable } from "./fixtures";

describe("order model", () => {
  it("computes profit as sale minus cost", () => {
    expect(computeProfit(400, 650)).to.equal(250);
    expect(computeProfit(0.1, 0.4)).to.equal(0.3);
    expect(computeProfit(null, 650)).to.equal(null);
  });

  it("falls back to the first status for unknown values", () => {
    expect(statusIndex(ORDER_STATUSES, "Shipped")).to.equal(2);
    expect(statusIndex(ORDER_STATUSES, " Shipped ")).to.equal(2);
    expect(statusIndex(ORDER_STATUSES, "Lost")).to.equal(0);
  });

  it("splits order names on newlines and commas", () => {
    expect(splitOrderNames("Home Jersey, Scarf\n\n Cap ,")).to.deep.equal([
      "Home Jersey",
      "Scarf",
      "Cap",
    ]);
    expect(splitOrderNames(" , \n")).to.deep.equal([]);
  });
});

describe("order table", () => {
  it("numbers rows from 1", () => {
    const rows = toRows(sampleTable());
    expect(rows.map((row) => row.id)).to.deep.equal([1, 2, 3, 4, 5]);
    expect(rows[0].order.customerName).to.equal("Alpha");
  });

  it("grows by one on add", () => {
    const table = sampleTable();
    const next = appendOrders(table, [makeOrder({ customerName: "Foxtrot" })]);
    expect(next).to.have.length(table.length + 1);
    expect(getOrder(next, 6).customerName).to.equal("Foxtrot");
    expect(table).to.have.length(5);
  });

  it("shrinks by one on delete", () => {
    const next = removeOrder(sampleTable(), 2);
    expect(next).to.have.length(4);
    expect(next.map((order) => order.customerName)).to.deep.equal([
      "Alpha",
      "Charlie",
      "Delta",
      "Echo",
    ]);
  });

  it("keeps the row count on edit and changes only the target", () => {
    const table = sampleTable();
    const next = replaceOrder(table, 3, { ...table[2], orderStatus: "Shipped" });
    expect(next).to.have.length(5);
    expect(next[2].orderStatus).to.equal("Shipped");
    expect(next[1]).to.equal(table[1]);
  });

  it("rejects ids outside the table", () => {
    const table = sampleTable();
    expect(() => getOrder(table, 0)).to.throw(OrderNotFoundError, "Order 0 does not exist");
    expect(() => removeOrder(table, 6)).to.throw(OrderNotFoundError);
    expect(() => replaceOrder(table, 1.5, makeOrder())).to.throw(OrderNotFoundError);
  });

  describe("filterOrders", () => {
    const today = "2025-02-10";

    it("keeps original ids", () => {
      const rows = filterOrders(sampleTable(), { search: "scarf" }, today);
      expect(rows.map((row) => row.id)).to.deep.equal([3, 5]);
    });

    it("filters by inclusive date range", () => {
      const rows = filterOrders(sampleTable(), { from: "2025-01-20", to: "2025-02-14" }, today);
      expect(rows.map((row) => row.order.customerName)).to.deep.equal([
        "Bravo",
        "Charlie",
        "Delta",
      ]);
    });

    it("treats an absent date as today", () => {
      const table = [makeOrder({ date: null }), makeOrder({ date: "2024-12-31" })];
      const rows = filterOrders(table, { from: "2025-02-01" }, today);
      expect(rows.map((row) => row.id)).to.deep.equal([1]);
    });

    it("filters by statuses and searches name and number", () => {
      const table = [
        makeOrder({ customerName: "Asha", number: "111", orderStatus: "Shipped", paymentStatus: "Paid" }),
        makeOrder({ customerName: "Kabir", number: "222", orderStatus: "Shipped", paymentStatus: "Unpaid" }),
        makeOrder({ customerName: "Meera", number: "333", orderStatus: "Pending", paymentStatus: "Paid" }),
      ];
      expect(
        filterOrders(table, { orderStatus: "Shipped", paymentStatus: "Paid" }, today).map(
          (row) => row.id,
        ),
      ).to.deep.equal([1]);
      expect(filterOrders(table, { search: "KAB" }, today).map((row) => row.id)).to.deep.equal([2]);
      expect(filterOrders(table, { search: "333" }, today).map((row) => row.id)).to.deep.equal([3]);
    });
  });
});
