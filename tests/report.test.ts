import { expect } from "chai";
import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { OrdersChart, ProfitChart } from "../src/dashboard/charts";
import { renderDashboardPdf, valueScale } from "../src/dashboard/pdf";
import { monthlySummary, summarize } from "../src/dashboard/summary";
import { sampleTable } from "./fixtures";

const today = "2025-03-15";

describe("dashboard charts", () => {
  it("renders both charts as SVG", () => {
    const monthly = monthlySummary(sampleTable(), today);
    for (const chart of [
      createElement(ProfitChart, { data: monthly }),
      createElement(OrdersChart, { data: monthly }),
    ]) {
      const markup = renderToStaticMarkup(chart);
      expect(markup).to.match(/^<div class="recharts-wrapper"/);
      expect(markup).to.include("recharts-surface");
    }
  });
});

describe("dashboard PDF", () => {
  it("scales values from a zero baseline", () => {
    const scale = valueScale([100, 550, 350]);
    expect(scale.min).to.equal(0);
    expect(scale.max).to.equal(550);
    expect(scale.offset(275, 100)).to.equal(50);

    const negative = valueScale([-50, 150]);
    expect(negative.min).to.equal(-50);
    expect(negative.offset(0, 200)).to.equal(50);

    const flat = valueScale([0, 0]);
    expect(flat.max).to.equal(1);
  });

  it("renders a PDF document", async () => {
    const pdf = await renderDashboardPdf(summarize(sampleTable(), today), {
      currencySymbol: "Rs. ",
      generatedOn: today,
    });
    expect(pdf.subarray(0, 5).toString("latin1")).to.equal("%PDF-");
    expect(pdf.subarray(-6).toString("latin1")).to.include("%%EOF");
  });

  it("renders an empty dashboard", async () => {
    const pdf = await renderDashboardPdf(summarize([], today), {
      currencySymbol: "Rs. ",
      generatedOn: today,
      title: "Empty",
    });
    expect(pdf.subarray(0, 5).toString("latin1")).to.equal("%PDF-");
  });
});
