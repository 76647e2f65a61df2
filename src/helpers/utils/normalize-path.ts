/**
 * Collapse backslashes and repeated slashes into single forward slashes
 */
export function normalizePath(path: string, { removeLeading } = { removeLeading: false }): string {
	let normalized = path.replace(/\\/g, '/').replace(/\/+/g, '/');

	if (normalized.length > 1 && normalized.endsWith('/')) {
		normalized = normalized.slice(0, -1);
	}

	if (removeLeading) {
		normalized = normalized.replace(/^\/+/, '');
	}

	return normalized;
}
