import type { RouteEntry } from "../app/types";

/** Endpoint / method / path listing, sorted by endpoint. */
export function formatRouteTable(routes: readonly RouteEntry[]): string {
  const header = { endpoint: "Endpoint", method: "Methods", path: "Rule" };
  const rows = [...routes]
    .sort((a, b) => a.endpoint.localeCompare(b.endpoint))
    .map((r) => ({ endpoint: r.endpoint, method: r.method, path: r.path }));
  const all = [header, ...rows];
  const widths = {
    endpoint: Math.max(...all.map((r) => r.endpoint.length)),
    method: Math.max(...all.map((r) => r.method.length)),
  };
  const line = (r: { endpoint: string; method: string; path: string }) =>
    `${r.endpoint.padEnd(widths.endpoint)}  ${r.method.padEnd(widths.method)}  ${r.path}`;

  return [
    line(header),
    `${"-".repeat(widths.endpoint)}  ${"-".repeat(widths.method)}  ${"-".repeat(Math.max(...all.map((r) => r.path.length)))}`,
    ...rows.map(line),
  ].join("\n");
}
