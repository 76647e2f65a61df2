export type AlmaValueDesc = {
	value?: string;
	desc?: string;
};

export type AlmaBibData = {
	mms_id?: string;
	title?: string | null;
	author?: string | null;
	[key: string]: unknown;
};

export type AlmaHoldingData = {
	holding_id?: string;
	temp_location?: AlmaValueDesc | null;
	[key: string]: unknown;
};

export type AlmaItemData = {
	pid?: string;
	barcode?: string;
	location?: AlmaValueDesc | null;
	provenance?: AlmaValueDesc | null;
	alternative_call_number?: string | null;
	internal_note_1?: string | null;
	[key: string]: unknown;
};

/**
 * Item record as returned by the Alma Bibs API. Fields not listed are carried through so a PUT
 * writes back the full record.
 */
export type AlmaItem = {
	bib_data: AlmaBibData;
	holding_data: AlmaHoldingData;
	item_data: AlmaItemData;
	[key: string]: unknown;
};

export type AlmaReportRow = Record<string, string | null>;
