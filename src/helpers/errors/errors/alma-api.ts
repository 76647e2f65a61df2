import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export interface AlmaApiErrorExtensions {
	status: number | null;
	almaCode: string | null;
	reason: string;
}

export const messageConstructor = ({ status, almaCode, reason }: AlmaApiErrorExtensions) => {
	const parts = [status !== null ? `HTTP ${status}` : null, almaCode ? `Alma error ${almaCode}` : null].filter(Boolean);

	return parts.length > 0 ? `Alma API request failed (${parts.join(', ')}): ${reason}` : `Alma API request failed: ${reason}`;
};

export const AlmaApiError = createError<AlmaApiErrorExtensions>(ErrorCode.AlmaApi, messageConstructor, 502);
