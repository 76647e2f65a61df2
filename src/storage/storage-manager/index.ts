import { Readable } from 'node:stream';

export type Range = {
	start: number;
	end?: number;
};

export type Stat = {
	size: number;
	modified: Date;
};

export type WriteContent = Readable | Buffer | string;

export interface Driver {
	read(filepath: string): Promise<Readable>;
	write(filepath: string, content: WriteContent, type?: string): Promise<void>;
	delete(filepath: string): Promise<void>;
	stat(filepath: string): Promise<Stat>;
	exists(filepath: string): Promise<boolean>;
	list(prefix?: string): AsyncIterable<string>;
}

export type DriverConfig = {
	/** Blob container (or sub directory for the local driver) the location reads and writes */
	container: string;
	[key: string]: unknown;
};

export type DriverConstructor = new (config: DriverConfig) => Driver;

export type LocationConfig = {
	driver: string;
	options: DriverConfig;
};

export class StorageManager {
	private drivers = new Map<string, DriverConstructor>();
	private locations = new Map<string, { container: string; driver: Driver }>();

	registerDriver(name: string, driver: DriverConstructor): void {
		this.drivers.set(name, driver);
	}

	registerLocation(name: string, config: LocationConfig): void {
		const Driver = this.drivers.get(config.driver);

		if (!Driver) {
			throw new Error(`Driver "${config.driver}" isn't registered.`);
		}

		this.locations.set(name, { container: config.options.container, driver: new Driver(config.options) });
	}

	location(name: string): Driver {
		const location = this.locations.get(name);

		if (!location) {
			throw new Error(`Location "${name}" doesn't exist.`);
		}

		return location.driver;
	}

	/**
	 * Resolve the location that stores blobs in the given container
	 */
	container(container: string): Driver {
		for (const location of this.locations.values()) {
			if (location.container === container) return location.driver;
		}

		throw new Error(`No storage location is configured for container "${container}".`);
	}

	/**
	 * Read a whole blob as UTF-8 text
	 */
	async readText(driver: Driver, filepath: string): Promise<string> {
		const stream = await driver.read(filepath);
		const chunks: Buffer[] = [];

		for await (const chunk of stream) {
			chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
		}

		return Buffer.concat(chunks).toString('utf8');
	}
}

export function toBuffer(content: Buffer | string): Buffer {
	return typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
}

export function isReadable(content: WriteContent): content is Readable {
	return content instanceof Readable;
}
