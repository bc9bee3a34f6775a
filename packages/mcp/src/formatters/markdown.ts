/**
 * Shared markdown formatting utilities for the J1939 decode MCP server.
 */

/** Escape characters that would break a table cell */
export function escapeCell(text: string): string {
	return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/**
 * Build a markdown table from headers and rows.
 *
 * Column widths are computed as the maximum of the header length and the
 * longest cell value in that column, so separators are never too short.
 * Cells are escaped with {@link escapeCell}.
 */
export function buildMarkdownTable(
	headers: string[],
	rows: string[][],
): string {
	const escapedRows = rows.map((row) => row.map(escapeCell));
	const colWidths = headers.map((h) => h.length);
	for (const row of escapedRows) {
		for (let i = 0; i < row.length; i++) {
			const cell = row[i] ?? "";
			if (cell.length > (colWidths[i] ?? 0)) {
				colWidths[i] = cell.length;
			}
		}
	}

	const pad = (s: string, w: number) => s.padEnd(w);
	const headerRow = `| ${headers.map((h, i) => pad(h, colWidths[i] ?? h.length)).join(" | ")} |`;
	const sepRow = `| ${colWidths.map((w) => "-".repeat(Math.max(w, 1))).join(" | ")} |`;
	const dataRows = escapedRows.map(
		(row) =>
			`| ${row.map((cell, i) => pad(cell, colWidths[i] ?? cell.length)).join(" | ")} |`,
	);

	return [headerRow, sepRow, ...dataRows].join("\n");
}

/**
 * Format a number for a table cell: at most `digits` decimals, trailing
 * zeros removed.
 *
 * @example
 * formatNumber(12.5); // "12.5"
 * formatNumber(0.03125, 4); // "0.0313"
 */
export function formatNumber(v: number, digits = 4): string {
	if (!Number.isFinite(v)) return String(v);
	const s = v.toFixed(digits);
	return s.includes(".") ? s.replace(/\.?0+$/, "") : s;
}
