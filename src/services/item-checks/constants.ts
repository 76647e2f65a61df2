/**
 * Provenance descriptions of the institutions whose items are checked
 */
export const PROVENANCE: readonly string[] = [
	'Property of American University',
	'Property of American University Law School',
	'Property of Catholic University of America',
	'Property of Gallaudet University',
	'Property of George Mason University',
	'Property of George Washington Himmelfarb',
	'Property of George Washington University',
	'Property of George Washington University School of Law',
	'Property of Georgetown University',
	'Property of Georgetown University School of Law',
	'Property of Howard University',
	'Property of Marymount University',
	'Property of National Security Archive',
	'Property of University of the District of Columbia',
	'Property of University of the District of Columbia Jazz Archives',
];

/** Internal note 1 values that exempt an item from the row/tray check */
export const EXCLUDED_NOTES: readonly string[] = ['At WRLC waiting to be processed', 'DO NOT DELETE', 'WD'];

/** Storage locations without row/tray shelving */
export const SKIP_LOCATIONS: readonly string[] = [
	'WRLC Gemtrac Drawer',
	'WRLC Microfilm Cabinet',
	'WRLC Microfiche Cabinet',
	'Low Temperature Media Preservation Unit  # 1 @ SCF',
];

export const ROW_TRAY_PATTERN = /^R.*M.*S/;

export const SHARED_CHECK_NAME = 'ScfShared';
