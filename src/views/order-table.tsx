import { ORDER_COLUMNS, type Order, type OrderRow } from "../orders/model";
import { formatCell } from "../utils/values";

function cellText(row: OrderRow, key: keyof Order): string {
  const value = row.order[key];
  return typeof value === "number" || value === null ? formatCell(value) : value;
}

export function OrderTableView({ rows }: { rows: readonly OrderRow[] }) {
  return (
    <table className="orders">
      <thead>
        <tr>
          <th>#</th>
          {ORDER_COLUMNS.map((column) => (
            <th key={column.key}>{column.header}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rows.map((row) => (
          <tr key={row.id}>
            <td>{row.id}</td>
            {ORDER_COLUMNS.map((column) => (
              <td key={column.key} className={column.numeric ? "numeric" : undefined}>
                {cellText(row, column.key)}
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}
