import type { ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { DataMode } from "../orders/store";
import { withMode, type Notice } from "./links";

export type Section = "add" | "edit" | "orders" | "dashboard" | "import";

const manageTabs: Array<{ section: Section; label: string; path: string }> = [
  { section: "add", label: "Add Order", path: "/orders/new" },
  { section: "edit", label: "Edit/Delete", path: "/orders/edit" },
  { section: "orders", label: "All Orders", path: "/orders" },
];

const mainTabs: Array<{ label: string; path: string; sections: Section[] }> = [
  { label: "Manage Orders", path: "/orders/new", sections: ["add", "edit", "orders"] },
  { label: "Dashboard", path: "/dashboard", sections: ["dashboard"] },
  { label: "Import Orders", path: "/import", sections: ["import"] },
];

export const TEST_MODE_WARNING =
  "You are currently running in TEST MODE. Data changes will not affect the live system.";

export interface LayoutProps {
  title: string;
  section?: Section;
  mode: DataMode;
  notice?: Notice;
  children?: ReactNode;
}

export function Message({ kind, children }: { kind: Notice["kind"] | "error"; children: ReactNode }) {
  return (
    <div className={`message message-${kind}`} role={kind === "error" ? "alert" : "status"}>
      {children}
    </div>
  );
}

export function Layout({ title, section, mode, notice, children }: LayoutProps) {
  const managing = section === "add" || section === "edit" || section === "orders";

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · Order Flow`}</title>
        <link rel="stylesheet" href="/styles.css" />
      </head>
      <body>
        <header>
          <h1>Order Flow</h1>
          <nav className="tabs">
            {mainTabs.map((tab) => (
              <a
                key={tab.label}
                href={withMode(tab.path, mode)}
                className={section && tab.sections.includes(section) ? "active" : undefined}
              >
                {tab.label}
              </a>
            ))}
          </nav>
          {managing && (
            <nav className="tabs sub-tabs">
              {manageTabs.map((tab) => (
                <a
                  key={tab.section}
                  href={withMode(tab.path, mode)}
                  className={tab.section === section ? "active" : undefined}
                >
                  {tab.label}
                </a>
              ))}
            </nav>
          )}
        </header>
        <main>
          {mode === "test" && <Message kind="warning">{TEST_MODE_WARNING}</Message>}
          {notice && <Message kind={notice.kind}>{notice.message}</Message>}
          <h2>{title}</h2>
          {children}
        </main>
      </body>
    </html>
  );
}

export function renderDocument(page: ReactNode): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<>{page}</>)}`;
}
