import { isObject } from '../utils/is-object.js';
import type { ErrorCode } from './codes.js';

/**
 * One entry of the `errors` array of an error response
 */
export type ErrorBody = {
	message: string;
	extensions: Record<string, unknown> & { code: string };
};

export interface AppError<Extensions = void> extends Error {
	readonly code: ErrorCode;
	readonly status: number;
	readonly extensions: Extensions;
	/** 5xx errors are the service's fault and get logged as such */
	readonly isServerError: boolean;
	toBody(): ErrorBody;
}

export interface AppErrorConstructor<Extensions = void> {
	new (extensions: Extensions, options?: ErrorOptions): AppError<Extensions>;
	readonly prototype: AppError<Extensions>;
}

type MessageSource<Extensions> = string | ((extensions: Extensions) => string);

/**
 * Create the error class for one error code. `status` is what the error handler answers with.
 */
export function createError<Extensions = void>(
	code: ErrorCode,
	message: MessageSource<Extensions>,
	status = 500,
): AppErrorConstructor<Extensions> {
	return class extends Error implements AppError<Extensions> {
		override readonly name = 'AppError';
		readonly code = code;
		readonly status = status;
		readonly extensions: Extensions;

		constructor(extensions: Extensions, options?: ErrorOptions) {
			super(typeof message === 'function' ? message(extensions) : message, options);

			this.extensions = extensions;
		}

		get isServerError(): boolean {
			return this.status >= 500;
		}

		toBody(): ErrorBody {
			const extensions = isObject(this.extensions) ? { ...this.extensions } : {};

			return { message: this.message, extensions: { ...extensions, code: this.code } };
		}

		override toString() {
			return `${this.name} [${this.code}]: ${this.message}`;
		}
	};
}
