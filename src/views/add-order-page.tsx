import type { FormValues } from "../orders/forms";
import type { DataMode } from "../orders/store";
import { Layout, Message, renderDocument } from "./layout";
import { withMode, type Notice } from "./links";
import { OrderFields } from "./order-form";

export interface FormProblem {
  message: string;
  fields: readonly string[];
}

export interface AddOrderPageProps {
  mode: DataMode;
  values: FormValues;
  notice?: Notice;
  problem?: FormProblem;
}

export function renderAddOrderPage({ mode, values, notice, problem }: AddOrderPageProps): string {
  return renderDocument(
    <Layout title="Add New Order" section="add" mode={mode} notice={notice}>
      {problem && <Message kind="error">{problem.message}</Message>}
      <form method="post" action={withMode("/orders", mode)} className="order-form">
        <OrderFields variant="add" values={values} invalid={problem?.fields} />
        <button type="submit">Add Order</button>
      </form>
    </Layout>,
  );
}
