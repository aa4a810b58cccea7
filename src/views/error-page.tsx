import type { DataMode } from "../orders/store";
import { Layout, Message, renderDocument } from "./layout";
import { withMode } from "./links";

export interface ErrorPageProps {
  mode: DataMode;
  statusCode: number;
  message: string;
}

export function renderErrorPage({ mode, statusCode, message }: ErrorPageProps): string {
  const title = statusCode === 404 ? "Not Found" : "Something went wrong";
  return renderDocument(
    <Layout title={title} mode={mode}>
      <Message kind="error">{message}</Message>
      <p>
        <a href={withMode("/orders", mode)}>Back to orders</a>
      </p>
    </Layout>,
  );
}
