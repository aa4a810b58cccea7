import { expect } from "chai";
import { isValidDate, monthOf, parseDateCell, toIsoDate } from "../src/utils/dates";
import { formatCell, meanOf, parseNumber, safeFloat, safeInt, sumOf } from "../src/utils/values";

describe("cell values", () => {
  it("parses numbers leniently", () => {
    expect(parseNumber("42")).to.equal(42);
    expect(parseNumber(" 1,250.5 ")).to.equal(1250.5);
    expect(parseNumber(7)).to.equal(7);
    expect(parseNumber("")).to.equal(null);
    expect(parseNumber("   ")).to.equal(null);
    expect(parseNumber("n/a")).to.equal(null);
    expect(parseNumber(Number.NaN)).to.equal(null);
    expect(parseNumber(undefined)).to.equal(null);
  });

  it("falls back when a value is absent", () => {
    expect(safeInt(null)).to.equal(1);
    expect(safeInt(3.9)).to.equal(3);
    expect(safeFloat(null)).to.equal(0);
    expect(safeFloat(12.5)).to.equal(12.5);
  });

  it("formats cells as plain decimals", () => {
    expect(formatCell(null)).to.equal("");
    expect(formatCell(250)).to.equal("250");
    expect(formatCell(0.1)).to.equal("0.1");
  });

  it("skips absent values in sums and means", () => {
    expect(sumOf([1, null, 2.5])).to.equal(3.5);
    expect(sumOf([])).to.equal(0);
    expect(meanOf([600, null, 700])).to.equal(650);
    expect(meanOf([null, null])).to.equal(null);
  });
});

describe("dates", () => {
  it("validates calendar dates", () => {
    expect(isValidDate(2024, 2, 29)).to.equal(true);
    expect(isValidDate(2025, 2, 29)).to.equal(false);
    expect(isValidDate(2025, 13, 1)).to.equal(false);
  });

  it("formats local dates", () => {
    expect(toIsoDate(new Date(2025, 0, 5))).to.equal("2025-01-05");
  });

  it("normalises date cells", () => {
    expect(parseDateCell("2025-03-07")).to.equal("2025-03-07");
    expect(parseDateCell("2025-3-7")).to.equal("2025-03-07");
    expect(parseDateCell("2025-03-07 00:00:00")).to.equal("2025-03-07");
    expect(parseDateCell("2025-02-30")).to.equal(null);
    expect(parseDateCell("")).to.equal(null);
    expect(parseDateCell("not a date")).to.equal(null);
  });

  it("buckets dates by month", () => {
    expect(monthOf("2025-03-07")).to.equal("2025-03");
  });
});
