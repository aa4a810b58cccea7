import { OrdersChart, ProfitChart } from "../dashboard/charts";
import { describeInsights, describeTotals, type LabelledValue } from "../dashboard/format";
import type { DashboardSummary, DateRange } from "../dashboard/summary";
import type { DataMode } from "../orders/store";
import { Layout, Message, renderDocument } from "./layout";
import { withMode } from "./links";

export interface DashboardPageProps {
  mode: DataMode;
  summary: DashboardSummary;
  range: DateRange;
  currencySymbol: string;
}

function Metrics({ items }: { items: LabelledValue[] }) {
  return (
    <dl className="metrics">
      {items.map(({ label, value }) => (
        <div key={label} className="metric">
          <dt>{label}</dt>
          <dd>{value}</dd>
        </div>
      ))}
    </dl>
  );
}

export function renderDashboardPage({
  mode,
  summary,
  range,
  currencySymbol,
}: DashboardPageProps): string {
  const empty = summary.monthly.length === 0;

  return renderDocument(
    <Layout title="Order Dashboard" section="dashboard" mode={mode}>
      <form method="get" action="/dashboard" className="filters">
        {mode === "test" && <input type="hidden" name="test" value="1" />}
        <label className="field">
          <span>From</span>
          <input type="date" name="from" defaultValue={range.from ?? ""} />
        </label>
        <label className="field">
          <span>To</span>
          <input type="date" name="to" defaultValue={range.to ?? ""} />
        </label>
        <button type="submit">Apply</button>
      </form>
      <Metrics items={describeTotals(summary.totals, currencySymbol)} />
      <section className="chart">
        <h3>Profit by Month</h3>
        {empty ?
          <Message kind="info">Not enough data for profit chart.</Message>
        : <ProfitChart data={summary.monthly} />}
      </section>
      <section className="chart">
        <h3>Orders per Month</h3>
        {empty ?
          <Message kind="info">Not enough data for orders chart.</Message>
        : <OrdersChart data={summary.monthly} />}
      </section>
      <section>
        <h3>Monthly Summary</h3>
        {summary.insights === null ?
          <Message kind="info">Not enough data to generate monthly summary.</Message>
        : <Metrics items={describeInsights(summary.insights, currencySymbol)} />}
      </section>
      <div className="downloads">
        <a
          href={withMode("/dashboard/report.pdf", mode, { from: range.from, to: range.to })}
          download="order_dashboard.pdf"
        >
          Download PDF
        </a>
      </div>
    </Layout>,
  );
}
