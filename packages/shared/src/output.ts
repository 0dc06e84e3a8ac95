import chalk from "chalk";

type Cell = string | number | boolean | undefined | null;

/**
 * Table lines: bold header, rule, then rows. Columns holding only numbers
 * are right-aligned; trailing padding is trimmed.
 */
export function formatTable(headers: string[], rows: Cell[][]): string[] {
  const text = rows.map((r) => headers.map((_, i) => String(r[i] ?? "")));
  const numeric = headers.map((_, i) => rows.length > 0 && rows.every((r) => typeof r[i] === "number"));
  const widths = headers.map((h, i) => Math.max(h.length, ...text.map((r) => (r[i] ?? "").length)));
  const align = (value: string, i: number) =>
    numeric[i] ? value.padStart(widths[i] ?? 0) : value.padEnd(widths[i] ?? 0);
  const line = (cells: string[]) => cells.map(align).join("  ").trimEnd();

  return [
    chalk.bold(line(headers)),
    widths.map((w) => "─".repeat(w)).join("  "),
    ...text.map(line),
  ];
}

export function table(headers: string[], rows: Cell[][]): void {
  for (const line of formatTable(headers, rows)) console.log(line);
}

/** One-row table of outcome counts, e.g. processed / no data / failed. */
export function tally(counts: Record<string, number>): void {
  table(Object.keys(counts), [Object.values(counts)]);
}

export function heading(text: string): void {
  console.log(chalk.bold.cyan(text));
}

export function subheading(text: string): void {
  console.log(chalk.bold(text));
}

export function success(text: string): void {
  console.log(chalk.green(text));
}

export function warn(text: string): void {
  console.error(chalk.yellow(`Warning: ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`Error: ${text}`));
}

export function info(text: string): void {
  console.log(chalk.dim(text));
}

/** A written output file, indented under the line that produced it. */
export function file(path: string): void {
  console.log(chalk.dim(`  ${path}`));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function blank(): void {
  console.log();
}
