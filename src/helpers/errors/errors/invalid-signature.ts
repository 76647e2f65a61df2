import { createError } from '../create-error.js';
import { ErrorCode } from '../codes.js';

export const InvalidSignatureError = createError(ErrorCode.InvalidSignature, 'Invalid signature.', 401);
