import { ORDER_STATUSES, PAYMENT_STATUSES, type OrderRow } from "../orders/model";
import type { DataMode } from "../orders/store";
import type { OrderFilter } from "../orders/table";
import { Layout, Message, renderDocument } from "./layout";
import { withMode, type Notice } from "./links";
import { OrderTableView } from "./order-table";

export interface OrdersPageProps {
  mode: DataMode;
  rows: OrderRow[];
  /** Row count before filtering */
  total: number;
  filter: OrderFilter;
  notice?: Notice;
}

function FilterSelect({
  name,
  label,
  options,
  value,
}: {
  name: string;
  label: string;
  options: readonly string[];
  value?: string;
}) {
  return (
    <label className="field">
      <span>{label}</span>
      <select name={name} defaultValue={value ?? ""}>
        <option value="">All</option>
        {options.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
    </label>
  );
}

export function renderOrdersPage({ mode, rows, total, filter, notice }: OrdersPageProps): string {
  return renderDocument(
    <Layout title="All Orders" section="orders" mode={mode} notice={notice}>
      <form method="get" action="/orders" className="filters">
        {mode === "test" && <input type="hidden" name="test" value="1" />}
        <label className="field">
          <span>From</span>
          <input type="date" name="from" defaultValue={filter.from ?? ""} />
        </label>
        <label className="field">
          <span>To</span>
          <input type="date" name="to" defaultValue={filter.to ?? ""} />
        </label>
        <FilterSelect
          name="status"
          label="Order Status"
          options={ORDER_STATUSES}
          value={filter.orderStatus}
        />
        <FilterSelect
          name="payment"
          label="Payment Status"
          options={PAYMENT_STATUSES}
          value={filter.paymentStatus}
        />
        <label className="field">
          <span>Search</span>
          <input type="search" name="q" defaultValue={filter.search ?? ""} />
        </label>
        <button type="submit">Apply</button>
      </form>
      <p className="count">{`Showing ${rows.length} of ${total} orders`}</p>
      {rows.length === 0 ?
        <Message kind="info">No orders found.</Message>
      : <OrderTableView rows={rows} />}
      <div className="downloads">
        <a href={withMode("/orders/export.csv", mode)} download="orders.csv">
          Download CSV
        </a>
        <a href={withMode("/orders/export.xlsx", mode)} download="orders.xlsx">
          Download Excel
        </a>
      </div>
    </Layout>,
  );
}
