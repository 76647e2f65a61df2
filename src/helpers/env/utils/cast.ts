import { toArray } from '../../utils/to-array.js';
import { getCastFlag } from './has-cast-prefix.js';
import { tryJson } from './try-json.js';

/**
 * Cast a raw environment value to its intended type.
 *
 * Values with an explicit prefix (`number:`, `boolean:`, `array:`, `json:`, `regex:`, `string:`)
 * are cast accordingly, other values are guessed.
 */
export const cast = (value: unknown): unknown => {
	const flag = getCastFlag(value);

	if (flag !== null && typeof value === 'string') {
		const raw = value.slice(flag.length + 1);

		switch (flag) {
			case 'string':
				return raw;
			case 'number':
				return Number(raw);
			case 'boolean':
				return raw === 'true' || raw === '1';
			case 'regex':
				return new RegExp(raw);
			case 'array':
				return toArray(raw).map((entry) => cast(entry));
			case 'json':
				return tryJson(raw);
		}
	}

	if (typeof value !== 'string') return value;

	if (value === 'true') return true;
	if (value === 'false') return false;
	if (value === 'null') return null;

	if (value.trim() !== '' && String(Number(value)) === value) return Number(value);

	if (value.startsWith('{') || value.startsWith('[')) return tryJson(value);

	return value;
};
