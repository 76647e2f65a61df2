import fse from 'fs-extra';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { isReadable, type Driver, type DriverConfig, type Stat, type WriteContent } from '../storage-manager/index.js';

export type DriverLocalConfig = DriverConfig & {
	root: string;
};

/**
 * Stores each container as a directory below the configured root
 */
export default class DriverLocal implements Driver {
	private root: string;

	constructor(config: DriverConfig) {
		const root = typeof config['root'] === 'string' ? config['root'] : '.';
		this.root = path.resolve(root, config.container);
	}

	private fullPath(filepath: string): string {
		const fullPath = path.resolve(this.root, filepath);

		if (fullPath !== this.root && !fullPath.startsWith(this.root + path.sep)) {
			throw new Error(`Path "${filepath}" is outside of the storage root`);
		}

		return fullPath;
	}

	async read(filepath: string): Promise<Readable> {
		return fse.createReadStream(this.fullPath(filepath));
	}

	async write(filepath: string, content: WriteContent): Promise<void> {
		const fullPath = this.fullPath(filepath);
		await fse.ensureDir(path.dirname(fullPath));

		if (isReadable(content)) {
			await pipeline(content, fse.createWriteStream(fullPath));
			return;
		}

		await fse.writeFile(fullPath, content);
	}

	async delete(filepath: string): Promise<void> {
		await fse.remove(this.fullPath(filepath));
	}

	async stat(filepath: string): Promise<Stat> {
		const stat = await fse.stat(this.fullPath(filepath));

		return {
			size: stat.size,
			modified: stat.mtime,
		};
	}

	async exists(filepath: string): Promise<boolean> {
		return fse.pathExists(this.fullPath(filepath));
	}

	async *list(prefix = ''): AsyncIterable<string> {
		if (!(await fse.pathExists(this.root))) return;

		yield* this.walk(this.root, prefix);
	}

	private async *walk(directory: string, prefix: string): AsyncIterable<string> {
		const entries = await fse.readdir(directory, { withFileTypes: true });

		for (const entry of entries) {
			const entryPath = path.join(directory, entry.name);

			if (entry.isDirectory()) {
				yield* this.walk(entryPath, prefix);
				continue;
			}

			const key = path.relative(this.root, entryPath).split(path.sep).join('/');

			if (key.startsWith(prefix)) yield key;
		}
	}
}
