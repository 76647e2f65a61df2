import type { Logger } from 'pino';
import type { Redis } from 'ioredis';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { useLogger } from '../../helpers/logger/index.js';
import { useRedis } from '../index.js';
import { withLock } from './distributed-lock.js';

vi.mock('../../helpers/logger/index.js');
vi.mock('../index.js');

const mockRedis = {
	set: vi.fn(),
	eval: vi.fn(),
};

const mockLogger = {
	debug: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
};

beforeEach(() => {
	vi.mocked(useRedis).mockReturnValue(mockRedis as unknown as Redis);
	vi.mocked(useLogger).mockReturnValue(mockLogger as unknown as Logger);
});

afterEach(() => {
	vi.clearAllMocks();
	vi.useRealTimers();
});

describe('withLock', () => {
	test('Acquires the lock, runs the operation and releases the lock', async () => {
		mockRedis.set.mockResolvedValue('OK');
		mockRedis.eval.mockResolvedValue(1);

		const operation = vi.fn().mockResolvedValue('result');

		const result = await withLock('item:32882019', operation);

		expect(result).toBe('result');
		expect(mockRedis.set).toHaveBeenCalledWith(
			'lock:item:32882019',
			expect.stringMatching(/^\d+:\d+$/),
			'PX',
			60000,
			'NX',
		);
		expect(operation).toHaveBeenCalledTimes(1);
		expect(mockRedis.eval).toHaveBeenCalledWith(expect.any(String), 1, 'lock:item:32882019', expect.any(String));
	});

	test('Uses twice the timeout as lock TTL for long operations', async () => {
		mockRedis.set.mockResolvedValue('OK');

		await withLock('report', vi.fn().mockResolvedValue(null), 120000);

		expect(mockRedis.set).toHaveBeenCalledWith('lock:report', expect.any(String), 'PX', 240000, 'NX');
	});

	test('Returns null when lock cannot be acquired', async () => {
		mockRedis.set.mockResolvedValue(null);

		const operation = vi.fn().mockResolvedValue('result');

		const result = await withLock('item:32882019', operation);

		expect(result).toBeNull();
		expect(operation).not.toHaveBeenCalled();
		expect(mockLogger.debug).toHaveBeenCalledWith('Lock already held for item:32882019');
	});

	test('Rejects when the operation outlives the timeout but holds the lock until it settles', async () => {
		vi.useFakeTimers();
		mockRedis.set.mockResolvedValue('OK');
		mockRedis.eval.mockResolvedValue(1);

		let finish: (value: string) => void = () => {};
		const operation = vi.fn(() => new Promise<string>((resolve) => (finish = resolve)));

		const pending = withLock('slow', operation, 100);
		const assertion = expect(pending).rejects.toThrow('Operation timed out after 100ms');

		await vi.advanceTimersByTimeAsync(100);
		await assertion;

		expect(mockRedis.eval).not.toHaveBeenCalled();

		finish('late result');

		await vi.waitFor(() => {
			expect(mockRedis.eval).toHaveBeenCalledWith(expect.stringContaining('"del"'), 1, 'lock:slow', expect.any(String));
		});
	});

	test('Keeps extending the lock of an abandoned operation', async () => {
		vi.useFakeTimers();
		mockRedis.set.mockResolvedValue('OK');
		mockRedis.eval.mockResolvedValue(1);

		let finish: (value: string) => void = () => {};
		const pending = withLock('long', () => new Promise<string>((resolve) => (finish = resolve)), 100);
		const assertion = expect(pending).rejects.toThrow('Operation timed out after 100ms');

		await vi.advanceTimersByTimeAsync(30000);
		await assertion;

		expect(mockRedis.eval).toHaveBeenCalledTimes(1);
		expect(mockRedis.eval).toHaveBeenCalledWith(expect.stringContaining('"pexpire"'), 1, 'lock:long', expect.any(String), 60000);

		finish('done');

		await vi.waitFor(() => {
			expect(mockRedis.eval).toHaveBeenLastCalledWith(expect.stringContaining('"del"'), 1, 'lock:long', expect.any(String));
		});
	});

	test('Rethrows operation errors', async () => {
		mockRedis.set.mockResolvedValue('OK');

		await expect(withLock('broken', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
		expect(mockLogger.error).toHaveBeenCalled();
	});
});
