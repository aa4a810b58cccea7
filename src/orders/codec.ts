import path from "node:path";
import * as XLSX from "xlsx";
import {
  ColumnMismatchError,
  ImportError,
  OrderFlowError,
  UnsupportedFormatError,
  errorMessage,
} from "../errors";
import { parseDateCell, toIsoDate } from "../utils/dates";
import { formatCell, parseNumber } from "../utils/values";
import {
  LEGACY_ORDER_HEADERS,
  ORDER_COLUMNS,
  ORDER_HEADERS,
  type Order,
} from "./model";

export const ORDERS_SHEET_NAME = "Orders";

export const CSV_MIME = "text/csv";
export const XLSX_MIME =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export type SheetFormat = "csv" | "xlsx";

type Cell = string | number | null;

function sameHeaders(received: readonly string[], expected: readonly string[]): boolean {
  return (
    received.length === expected.length &&
    received.every((header, index) => header === expected[index])
  );
}

function orderCells(order: Order, numbersAsText: boolean): Cell[] {
  return ORDER_COLUMNS.map((column) => {
    const value = order[column.key];
    if (typeof value === "number") {
      return numbersAsText ? formatCell(value) : value;
    }
    if (value === null) {
      return numbersAsText ? "" : null;
    }
    return value;
  });
}

function sheetToRows(sheet: XLSX.WorkSheet): string[][] {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: true,
    blankrows: false,
  });
  // raw: numbers arrive unrounded, not as "General" display text
  return rows.map((row) =>
    row.map((cell) =>
      typeof cell === "string" ? cell
      : cell instanceof Date ? toIsoDate(cell)
      : cell === null || cell === undefined ? ""
      : String(cell),
    ),
  );
}

function firstSheet(workbook: XLSX.WorkBook): XLSX.WorkSheet {
  const name =
    workbook.SheetNames.find((candidate) => candidate === ORDERS_SHEET_NAME) ??
    workbook.SheetNames[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) {
    throw new ImportError("Error reading file: workbook has no sheets");
  }
  return sheet;
}

/**
 * Header row plus data rows of a CSV document, every cell as text.
 */
export function readCsvRows(text: string): string[][] {
  const content = text.replace(/^\uFEFF/, "");
  if (content.trim() === "") {
    return [];
  }
  // raw: keep "0012" and "2025-01-02" as typed instead of coercing them
  // FS: products joined with "; " must not make the reader guess ";" as the separator
  const workbook = XLSX.read(content, { type: "string", raw: true, FS: "," });
  return sheetToRows(firstSheet(workbook));
}

export function readXlsxRows(data: Buffer): string[][] {
  const workbook = XLSX.read(data, { type: "buffer", cellDates: true });
  return sheetToRows(firstSheet(workbook));
}

export function formatOf(filename: string): SheetFormat {
  const extension = path.extname(filename).toLowerCase();
  if (extension === ".csv") return "csv";
  if (extension === ".xlsx") return "xlsx";
  throw new UnsupportedFormatError(filename);
}

/**
 * Reads an uploaded file into text rows, choosing the parser by extension.
 */
export function readUploadRows(filename: string, data: Buffer): string[][] {
  const format = formatOf(filename);
  try {
    return format === "csv" ? readCsvRows(data.toString("utf8")) : readXlsxRows(data);
  } catch (error) {
    if (error instanceof OrderFlowError) throw error;
    throw new ImportError(`Error reading file: ${errorMessage(error)}`);
  }
}

/**
 * Converts text rows (header first) into orders. The header must be the full
 * column list or the legacy list without `Date`.
 */
export function decodeRows(rows: readonly string[][]): Order[] {
  const [header, ...body] = rows;
  const received = (header ?? []).map((name) => name.trim());
  if (
    !sameHeaders(received, ORDER_HEADERS) &&
    !sameHeaders(received, LEGACY_ORDER_HEADERS)
  ) {
    throw new ColumnMismatchError(received);
  }

  const positions = new Map(received.map((name, index) => [name, index]));
  const text = (row: readonly string[], name: string): string => {
    const index = positions.get(name);
    return index === undefined ? "" : (row[index] ?? "");
  };

  return body
    .filter((row) => row.some((cell) => cell.trim() !== ""))
    .map((row) => ({
      customerName: text(row, "Customer Name"),
      number: text(row, "Number"),
      order: text(row, "Order"),
      quantity: parseNumber(text(row, "Quantity")),
      nameset: text(row, "Nameset"),
      costPrice: parseNumber(text(row, "Cost Price")),
      salePrice: parseNumber(text(row, "Sale Price")),
      profit: parseNumber(text(row, "Profit")),
      orderStatus: text(row, "Order Status"),
      paymentStatus: text(row, "Payment Status"),
      trackingDetail: text(row, "Tracking Detail"),
      date: parseDateCell(text(row, "Date")),
    }));
}

export function decodeCsv(text: string): Order[] {
  return decodeRows(readCsvRows(text));
}

export function decodeXlsx(data: Buffer): Order[] {
  return decodeRows(readXlsxRows(data));
}

export function decodeUpload(filename: string, data: Buffer): Order[] {
  return decodeRows(readUploadRows(filename, data));
}

export function encodeCsv(orders: readonly Order[]): string {
  const sheet = XLSX.utils.aoa_to_sheet([
    [...ORDER_HEADERS],
    ...orders.map((order) => orderCells(order, true)),
  ]);
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}

export function encodeXlsx(orders: readonly Order[]): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([
    [...ORDER_HEADERS],
    ...orders.map((order) => orderCells(order, false)),
  ]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, ORDERS_SHEET_NAME);
  const output: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return output;
}

/** Header-only CSV handed out as the import template. */
export function templateCsv(): string {
  return encodeCsv([]);
}
