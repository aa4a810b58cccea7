import type { FormValues } from "../orders/forms";
import type { OrderRow } from "../orders/model";
import type { DataMode } from "../orders/store";
import type { FormProblem } from "./add-order-page";
import { Layout, Message, renderDocument } from "./layout";
import { withMode, type Notice } from "./links";
import { OrderFields } from "./order-form";

export interface EditOrderPageProps {
  mode: DataMode;
  rows: OrderRow[];
  /** Row being edited; absent when the table is empty */
  selected?: number;
  values: FormValues;
  notice?: Notice;
  problem?: FormProblem;
}

function rowLabel({ id, order }: OrderRow): string {
  return `${id}: ${order.customerName} - ${order.order}`;
}

export function renderEditOrderPage({
  mode,
  rows,
  selected,
  values,
  notice,
  problem,
}: EditOrderPageProps): string {
  return renderDocument(
    <Layout title="Modify or Delete Orders" section="edit" mode={mode} notice={notice}>
      {rows.length === 0 || selected === undefined ?
        <Message kind="info">No orders to modify.</Message>
      : <>
          <form method="get" action="/orders/edit" className="row-picker">
            {mode === "test" && <input type="hidden" name="test" value="1" />}
            <label className="field">
              <span>Select Order</span>
              <select name="id" defaultValue={String(selected)}>
                {rows.map((row) => (
                  <option key={row.id} value={String(row.id)}>
                    {rowLabel(row)}
                  </option>
                ))}
              </select>
            </label>
            <button type="submit">Open</button>
          </form>
          {problem && <Message kind="error">{problem.message}</Message>}
          <form
            method="post"
            action={withMode(`/orders/${selected}`, mode)}
            className="order-form"
          >
            <OrderFields variant="edit" values={values} invalid={problem?.fields} />
            <div className="actions">
              <button type="submit" name="action" value="save">
                Update Order
              </button>
              <button type="submit" name="action" value="delete" className="danger">
                Delete Order
              </button>
            </div>
          </form>
        </>
      }
    </Layout>,
  );
}
