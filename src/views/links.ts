import type { DataMode } from "../orders/store";

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Builds an in-app URL that keeps the test-mode flag.
 */
export function withMode(path: string, mode: DataMode, params: QueryParams = {}): string {
  const search = new URLSearchParams();
  if (mode === "test") {
    search.set("test", "1");
  }
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== "") {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `${path}?${query}` : path;
}

export type NoticeKind = "success" | "warning" | "info";

export interface Notice {
  kind: NoticeKind;
  message: string;
}

export const NOTICES = {
  added: { kind: "success", message: "Order Added!" },
  updated: { kind: "success", message: "Order Updated!" },
  deleted: { kind: "warning", message: "Order Deleted" },
  imported: { kind: "success", message: "Orders Imported Successfully!" },
} satisfies Record<string, Notice>;

export function noticeFor(key: string | undefined): Notice | undefined {
  switch (key) {
    case "added":
    case "updated":
    case "deleted":
    case "imported":
      return NOTICES[key];
    default:
      return undefined;
  }
}
