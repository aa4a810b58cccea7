import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { Order } from "../src/orders/model";

export const silentLogger = pino({ level: "silent" });

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    customerName: "Test Customer",
    number: "9000000000",
    order: "Home Jersey",
    quantity: 1,
    nameset: "",
    costPrice: 100,
    salePrice: 150,
    profit: 50,
    orderStatus: "Pending",
    paymentStatus: "Unpaid",
    trackingDetail: "",
    date: "2025-01-10",
    ...overrides,
  };
}

/**
 * Five orders over three months:
 * 2025-01: Home Jersey x2 (A, B)  2025-02: Scarf, Home Jersey  2025-03: Scarf
 */
export function sampleTable(): Order[] {
  return [
    makeOrder({
      customerName: "Alpha",
      order: "Home Jersey",
      quantity: 2,
      costPrice: 400,
      salePrice: 650,
      profit: 250,
      date: "2025-01-05",
    }),
    makeOrder({
      customerName: "Bravo",
      order: "Home Jersey",
      quantity: 1,
      costPrice: 400,
      salePrice: 700,
      profit: 300,
      date: "2025-01-20",
    }),
    makeOrder({
      customerName: "Charlie",
      order: "Scarf",
      quantity: 3,
      costPrice: 100,
      salePrice: 250,
      profit: 150,
      date: "2025-02-02",
    }),
    makeOrder({
      customerName: "Delta",
      order: "Home Jersey",
      quantity: 1,
      costPrice: 400,
      salePrice: 600,
      profit: 200,
      date: "2025-02-14",
    }),
    makeOrder({
      customerName: "Echo",
      order: "Scarf",
      quantity: 4,
      costPrice: 100,
      salePrice: 200,
      profit: 100,
      date: "2025-03-01",
    }),
  ];
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "order-flow-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
