import PDFDocument from "pdfkit";
import { chartColors } from "./charts";
import { describeInsights, describeTotals, formatMoney } from "./format";
import type { DashboardSummary, MonthlySummary } from "./summary";

export interface PdfReportOptions {
  /** Text label in place of the currency glyph; standard PDF fonts lack "₹" */
  currencySymbol: string;
  /** YYYY-MM-DD, printed under the title */
  generatedOn: string;
  title?: string;
}

export interface ValueScale {
  min: number;
  max: number;
  /** Distance from the chart's bottom edge, in points, for `value` */
  offset(value: number, height: number): number;
}

interface ChartBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

interface ChartSeries {
  title: string;
  kind: "line" | "bar";
  color: string;
  labels: string[];
  values: number[];
  formatValue: (value: number) => string;
}

const CHART_BOX_HEIGHT = 170;

/**
 * Linear scale that always includes zero so bars grow from a baseline.
 */
export function valueScale(values: readonly number[]): ValueScale {
  const min = Math.min(0, ...values);
  let max = Math.max(0, ...values);
  if (max === min) {
    max = min + 1;
  }
  return {
    min,
    max,
    offset: (value, height) => ((value - min) / (max - min)) * height,
  };
}

function drawChart(doc: PDFKit.PDFDocument, box: ChartBox, series: ChartSeries): void {
  const { x, y, width, height } = box;
  const bottom = y + height;
  const scale = valueScale(series.values);
  const band = width / Math.max(series.values.length, 1);
  const zeroY = bottom - scale.offset(0, height);

  doc.fontSize(12).fillColor("black").text(series.title, x, y - 20);

  doc.save();
  doc.lineWidth(0.5).strokeColor("#9ca3af");
  doc.moveTo(x, y).lineTo(x, bottom).stroke();
  doc.moveTo(x, zeroY).lineTo(x + width, zeroY).stroke();
  doc.restore();

  doc.fontSize(7).fillColor("#4b5563");
  doc.text(series.formatValue(scale.max), x - 46, y - 3, { width: 42, align: "right" });
  doc.text(series.formatValue(scale.min), x - 46, bottom - 3, { width: 42, align: "right" });

  if (series.kind === "bar") {
    const barWidth = band * 0.6;
    series.values.forEach((value, index) => {
      const top = bottom - scale.offset(value, height);
      doc
        .rect(
          x + index * band + (band - barWidth) / 2,
          Math.min(top, zeroY),
          barWidth,
          Math.max(Math.abs(zeroY - top), 0.5),
        )
        .fill(series.color);
    });
  } else {
    const points = series.values.map((value, index) => ({
      px: x + band * (index + 0.5),
      py: bottom - scale.offset(value, height),
    }));
    doc.save();
    doc.lineWidth(1.5).strokeColor(series.color);
    points.forEach(({ px, py }, index) => {
      if (index === 0) doc.moveTo(px, py);
      else doc.lineTo(px, py);
    });
    doc.stroke();
    points.forEach(({ px, py }) => doc.circle(px, py, 2).fill(series.color));
    doc.restore();
  }

  doc.fontSize(7).fillColor("#4b5563");
  series.labels.forEach((label, index) => {
    doc.text(label, x + index * band, bottom + 4, { width: band, align: "center" });
  });
  doc.fillColor("black");
}

function monthlySeries(
  monthly: readonly MonthlySummary[],
  currencySymbol: string,
): ChartSeries[] {
  const labels = monthly.map((month) => month.month);
  return [
    {
      title: "Profit by Month",
      kind: "line",
      color: chartColors.profit,
      labels,
      values: monthly.map((month) => month.profit),
      formatValue: (value) => formatMoney(value, currencySymbol),
    },
    {
      title: "Orders per Month",
      kind: "bar",
      color: chartColors.orders,
      labels,
      values: monthly.map((month) => month.totalOrders),
      formatValue: (value) => String(Math.round(value)),
    },
  ];
}

/**
 * Renders the dashboard (totals, both monthly charts as vector graphics and
 * the insights) to a single-page A4 PDF.
 */
export function renderDashboardPdf(
  summary: DashboardSummary,
  options: PdfReportOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const title = options.title ?? "Order Dashboard";
    const doc = new PDFDocument({
      size: "A4",
      margin: 48,
      info: { Title: title },
    });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    const left = doc.page.margins.left + 48;
    const width = doc.page.width - left - doc.page.margins.right;

    doc.fontSize(20).text(title, doc.page.margins.left, doc.page.margins.top);
    doc.fontSize(9).fillColor("#4b5563").text(`Generated ${options.generatedOn}`);
    doc.fillColor("black").moveDown();

    doc.fontSize(11);
    for (const { label, value } of describeTotals(summary.totals, options.currencySymbol)) {
      doc.text(`${label}: ${value}`);
    }

    let top = doc.y + 40;
    if (summary.monthly.length === 0) {
      doc.moveDown().text("Not enough data for profit chart.");
      doc.text("Not enough data for orders chart.");
      top = doc.y + 20;
    } else {
      for (const series of monthlySeries(summary.monthly, options.currencySymbol)) {
        drawChart(doc, { x: left, y: top, width, height: CHART_BOX_HEIGHT }, series);
        top += CHART_BOX_HEIGHT + 60;
      }
    }

    doc.fontSize(13).text("Insights", doc.page.margins.left, top - 20);
    doc.fontSize(10);
    if (summary.insights === null) {
      doc.text("Not enough data to generate monthly summary.");
    } else {
      for (const { label, value } of describeInsights(summary.insights, options.currencySymbol)) {
        doc.text(`${label}: ${value}`);
      }
    }

    doc.end();
  });
}
