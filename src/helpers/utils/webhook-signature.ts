import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * Alma signs webhook bodies with HMAC-SHA256 over the raw body and sends the base64 digest in `X-Exl-Signature`
 */
export function signPayload(body: Buffer | string, secret: string): string {
	return createHmac('sha256', secret).update(body).digest('base64');
}

export function isValidSignature(body: Buffer | string, secret: string | null | undefined, received: string | null | undefined): boolean {
	if (!secret || !received) return false;

	const expected = Buffer.from(signPayload(body, secret));
	const actual = Buffer.from(received);

	if (expected.length !== actual.length) return false;

	return timingSafeEqual(expected, actual);
}
