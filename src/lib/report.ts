// Markdown building blocks for the text content of tool results.

function escapeCell(value: string | number): string {
  return String(value).replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function table(headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  const head = `| ${headers.map(escapeCell).join(" | ")} |`;
  const rule = `|${headers.map(() => "---").join("|")}|`;
  const body = rows.map((row) => `| ${row.map(escapeCell).join(" | ")} |`);
  return [head, rule, ...body].join("\n");
}

export function numbered(items: readonly string[]): string {
  return items.map((item, index) => `${index + 1}. ${item}`).join("\n");
}

export function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

export function section(title: string, body: string, level = 3): string {
  return `${"#".repeat(level)} ${title}\n${body}`;
}

export function document(title: string, parts: readonly string[]): string {
  return [`# ${title}`, ...parts.filter((part) => part.length > 0)].join("\n\n") + "\n";
}
