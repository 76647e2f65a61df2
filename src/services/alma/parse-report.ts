import { load } from 'cheerio';
import type { AlmaReportRow } from '../../types/index.js';

export type ReportPage = {
	rows: AlmaReportRow[];
	resumptionToken: string | null;
	isFinished: boolean;
};

/**
 * Parse one page of an Analytics report. Columns are named after their heading when the report
 * was requested with `col_names=true`, otherwise after the element (`Column0`, `Column1`, ...).
 * Headings only come with the first page, so later pages reuse the ones passed in.
 */
export function parseReportPage(xml: string, knownHeadings: Map<string, string> = new Map()): ReportPage & {
	headings: Map<string, string>;
} {
	const $ = load(xml, { xml: true });

	const headings = new Map(knownHeadings);

	$('xsd\\:element').each((_, el) => {
		const name = $(el).attr('name');
		const heading = $(el).attr('saw-sql:columnHeading');

		if (name) headings.set(name, heading ?? name);
	});

	const rows: AlmaReportRow[] = [];

	$('Row').each((_, row) => {
		const record: AlmaReportRow = {};

		for (const heading of headings.values()) {
			record[heading] = null;
		}

		$(row)
			.children()
			.each((_, cell) => {
				const name = cell.tagName;
				record[headings.get(name) ?? name] = $(cell).text();
			});

		rows.push(record);
	});

	const token = $('ResumptionToken').first().text().trim();

	return {
		rows,
		headings,
		resumptionToken: token === '' ? null : token,
		isFinished: $('IsFinished').first().text().trim().toLowerCase() !== 'false',
	};
}
