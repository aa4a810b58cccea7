import { toRows } from "../orders/table";
import type { Order } from "../orders/model";
import type { DataMode } from "../orders/store";
import { Layout, Message, renderDocument } from "./layout";
import { withMode, type Notice } from "./links";
import { OrderTableView } from "./order-table";

export interface ImportPreview {
  filename: string;
  orders: Order[];
  /** The decoded rows re-encoded as CSV, posted back on confirm */
  payload: string;
}

export interface ImportPageProps {
  mode: DataMode;
  notice?: Notice;
  error?: string;
  preview?: ImportPreview;
}

export function renderImportPage({ mode, notice, error, preview }: ImportPageProps): string {
  return renderDocument(
    <Layout title="Import Orders from CSV or Excel" section="import" mode={mode} notice={notice}>
      <p>
        <a href={withMode("/import/template.csv", mode)} download="order_template.csv">
          Download Template CSV
        </a>
      </p>
      <form
        method="post"
        action={withMode("/import/preview", mode)}
        encType="multipart/form-data"
        className="upload"
      >
        <label className="field">
          <span>Upload CSV or Excel File</span>
          <input type="file" name="file" accept=".csv,.xlsx" />
        </label>
        <button type="submit">Preview</button>
      </form>
      {error && <Message kind="error">{error}</Message>}
      {preview && (
        <section className="preview">
          <h3>{`Preview of ${preview.filename}`}</h3>
          {preview.orders.length === 0 ?
            <Message kind="info">The file contains no orders.</Message>
          : <>
              <OrderTableView rows={toRows(preview.orders)} />
              <form method="post" action={withMode("/import", mode)}>
                <input type="hidden" name="payload" value={preview.payload} />
                <button type="submit">Confirm Import</button>
              </form>
            </>
          }
        </section>
      )}
    </Layout>,
  );
}
