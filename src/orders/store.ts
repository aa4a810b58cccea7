import { promises as fs } from "node:fs";
import type { BaseLogger } from "pino";
import { DataFileError, errorMessage } from "../errors";
import { decodeRows, encodeCsv, readCsvRows } from "./codec";
import type { Order } from "./model";
import {
  appendOrders,
  getOrder,
  removeOrder,
  replaceOrder,
  type OrderTable,
} from "./table";

/** The logging calls the store makes; Fastify's child loggers satisfy it. */
export type StoreLogger = Pick<BaseLogger, "info" | "debug">;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * The order table persisted as one CSV file. Every mutation reads the whole
 * file, changes the in-memory table and writes the whole file back. There is
 * no locking: concurrent writers can overwrite each other.
 */
export class CsvOrderStore {
  constructor(
    readonly filePath: string,
    private readonly logger: StoreLogger,
  ) {}

  /** Creates the file with just the header row when it does not exist. */
  async init(): Promise<void> {
    try {
      await fs.access(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new DataFileError(
          `Cannot access ${this.filePath}: ${errorMessage(error)}`,
        );
      }
      await this.saveAll([]);
      this.logger.info({ file: this.filePath }, "Created empty order table");
    }
  }

  async load(): Promise<Order[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new DataFileError(`Cannot read ${this.filePath}: ${errorMessage(error)}`);
    }

    try {
      const rows = readCsvRows(content);
      return rows.length === 0 ? [] : decodeRows(rows);
    } catch (error) {
      throw new DataFileError(
        `${this.filePath} is not a valid order table: ${errorMessage(error)}`,
      );
    }
  }

  async saveAll(table: OrderTable): Promise<void> {
    await fs.writeFile(this.filePath, encodeCsv(table), "utf-8");
    this.logger.debug({ file: this.filePath, rows: table.length }, "Saved order table");
  }

  async get(id: number): Promise<Order> {
    return getOrder(await this.load(), id);
  }

  async add(order: Order): Promise<number> {
    const table = appendOrders(await this.load(), [order]);
    await this.saveAll(table);
    this.logger.info({ id: table.length, customer: order.customerName }, "Order added");
    return table.length;
  }

  async update(id: number, order: Order): Promise<void> {
    await this.saveAll(replaceOrder(await this.load(), id, order));
    this.logger.info({ id }, "Order updated");
  }

  async remove(id: number): Promise<void> {
    await this.saveAll(removeOrder(await this.load(), id));
    this.logger.info({ id }, "Order deleted");
  }

  async importOrders(orders: readonly Order[]): Promise<number> {
    const table = appendOrders(await this.load(), orders);
    await this.saveAll(table);
    this.logger.info({ imported: orders.length, total: table.length }, "Orders imported");
    return table.length;
  }
}

/**
 * Live and test-mode tables. Requests flagged `test=1` use `sample`.
 */
export interface OrderStores {
  live: CsvOrderStore;
  sample: CsvOrderStore;
}

export type DataMode = "live" | "test";

export function storeFor(stores: OrderStores, mode: DataMode): CsvOrderStore {
  return mode === "test" ? stores.sample : stores.live;
}
