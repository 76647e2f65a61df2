export type TableData = {
	headers: string[];
	rows: string[][];
};

export const NO_DISPLAYABLE_DATA = '<i>Report generated, but contained no displayable data.</i><br>';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCell(value: unknown): string {
	if (value === null || value === undefined) return '';
	if (typeof value === 'object') return JSON.stringify(value);
	return String(value);
}

/**
 * Turn report records into table data. Columns are the union of record keys in first-seen order.
 * Analytics reports carry a leading column "0" filled with zeros, which is dropped.
 *
 * @returns null when there are no records
 */
export function recordsToTable(records: unknown[]): TableData | null {
	const rows = records.filter(isRecord);

	if (rows.length === 0) return null;

	const headers: string[] = [];

	for (const row of rows) {
		for (const key of Object.keys(row)) {
			if (!headers.includes(key)) headers.push(key);
		}
	}

	const visible = headers.filter((header) => header !== '0' || !rows.every((row) => toCell(row[header]) === '0'));

	return {
		headers: visible,
		rows: rows.map((row) => visible.map((header) => toCell(row[header]))),
	};
}
