import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { useEnv } from '../../helpers/env/index.js';
import { AlmaApiError } from '../../helpers/errors/index.js';
import { useLogger } from '../../helpers/logger/index.js';
import type { AlmaItem, AlmaReportRow } from '../../types/index.js';
import { parseReportPage } from './parse-report.js';

const REGIONS: Record<string, string> = {
	NA: 'https://api-na.hosted.exlibrisgroup.com',
	EU: 'https://api-eu.hosted.exlibrisgroup.com',
	AP: 'https://api-ap.hosted.exlibrisgroup.com',
	CA: 'https://api-ca.hosted.exlibrisgroup.com',
	CN: 'https://api-cn.hosted.exlibrisgroup.com.cn',
};

/** Alma's answer when a barcode lookup matches nothing */
const NO_ITEM_FOUND = '401689';

const REPORT_PAGE_SIZE = 1000;

export type AlmaClientOptions = {
	region?: string;
	timeout?: number;
	/** Replaces the HTTP transport, used by tests */
	adapter?: AxiosAdapter;
};

type AlmaErrorBody = {
	errorList?: { error?: { errorCode?: string; errorMessage?: string }[] };
};

function isAlmaErrorBody(data: unknown): data is AlmaErrorBody {
	return typeof data === 'object' && data !== null && 'errorList' in data;
}

function isAlmaItem(data: unknown): data is AlmaItem {
	return (
		typeof data === 'object' &&
		data !== null &&
		'item_data' in data &&
		'bib_data' in data &&
		'holding_data' in data
	);
}

export class AlmaClient {
	private http: AxiosInstance;
	private logger = useLogger();

	constructor(apiKey: string, options: AlmaClientOptions = {}) {
		const env = useEnv();
		const region = (options.region ?? String(env['ALMA_REGION'])).toUpperCase();
		const baseURL = REGIONS[region];

		if (!baseURL) {
			throw new Error(`Unknown Alma region "${region}"`);
		}

		this.http = axios.create({
			baseURL,
			timeout: options.timeout ?? Number(env['ALMA_TIMEOUT']),
			headers: {
				Authorization: `apikey ${apiKey}`,
				Accept: 'application/json',
			},
			...(options.adapter && { adapter: options.adapter }),
		});
	}

	/**
	 * Look an item up by barcode. Returns null when Alma knows no item with that barcode.
	 */
	async getItemByBarcode(barcode: string): Promise<AlmaItem | null> {
		try {
			const { data } = await this.http.get<unknown>('/almaws/v1/items', { params: { item_barcode: barcode } });

			if (!isAlmaItem(data)) {
				throw new AlmaApiError({ status: null, almaCode: null, reason: 'Unexpected item response' });
			}

			return data;
		} catch (error) {
			const almaError = this.toAlmaError(error);

			if (almaError.extensions.almaCode === NO_ITEM_FOUND) {
				this.logger.debug(`No Alma item found for barcode ${barcode}`);
				return null;
			}

			throw almaError;
		}
	}

	/**
	 * Write the full item record back to Alma
	 */
	async updateItem(item: AlmaItem): Promise<AlmaItem> {
		const mmsId = item.bib_data.mms_id;
		const holdingId = item.holding_data.holding_id;
		const pid = item.item_data.pid;

		if (!mmsId || !holdingId || !pid) {
			throw new AlmaApiError({ status: null, almaCode: null, reason: 'Item is missing mms_id, holding_id or pid' });
		}

		try {
			const { data } = await this.http.put<unknown>(`/almaws/v1/bibs/${mmsId}/holdings/${holdingId}/items/${pid}`, item, {
				headers: { 'Content-Type': 'application/json' },
			});

			return isAlmaItem(data) ? data : item;
		} catch (error) {
			throw this.toAlmaError(error);
		}
	}

	/**
	 * Fetch every row of an Analytics report, following resumption tokens
	 */
	async getReport(path: string, timeout?: number): Promise<AlmaReportRow[]> {
		const rows: AlmaReportRow[] = [];
		let headings = new Map<string, string>();
		let token: string | null = null;

		for (;;) {
			const params: Record<string, string | number | boolean> = token
				? { token, limit: REPORT_PAGE_SIZE }
				: { path, limit: REPORT_PAGE_SIZE, col_names: true };

			let xml: string;

			try {
				const response = await this.http.get<string>('/almaws/v1/analytics/reports', {
					params,
					headers: { Accept: 'application/xml' },
					responseType: 'text',
					...(timeout !== undefined && { timeout }),
				});

				xml = response.data;
			} catch (error) {
				throw this.toAlmaError(error);
			}

			const page = parseReportPage(xml, headings);

			rows.push(...page.rows);
			headings = page.headings;
			token = page.resumptionToken ?? token;

			if (page.isFinished || token === null || page.rows.length === 0) break;
		}

		return rows;
	}

	private toAlmaError(error: unknown): InstanceType<typeof AlmaApiError> {
		if (error instanceof AlmaApiError) return error;

		if (error instanceof AxiosError) {
			const status = error.response?.status ?? null;
			const body: unknown = error.response?.data;
			const firstError = isAlmaErrorBody(body) ? body.errorList?.error?.[0] : undefined;

			return new AlmaApiError(
				{
					status,
					almaCode: firstError?.errorCode ?? null,
					reason: firstError?.errorMessage ?? error.message,
				},
				{ cause: error },
			);
		}

		return new AlmaApiError(
			{ status: null, almaCode: null, reason: error instanceof Error ? error.message : String(error) },
			{ cause: error },
		);
	}
}
