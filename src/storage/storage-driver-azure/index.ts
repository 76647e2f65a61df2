import { BlobServiceClient, type ContainerClient } from '@azure/storage-blob';
import { Readable } from 'node:stream';
import { normalizePath } from '../../helpers/utils/normalize-path.js';
import { isReadable, toBuffer, type Driver, type DriverConfig, type Stat, type WriteContent } from '../storage-manager/index.js';

export type DriverAzureConfig = DriverConfig & {
	connectionString: string;
	root?: string;
};

function isAzureConfig(config: DriverConfig): config is DriverAzureConfig {
	return typeof config['connectionString'] === 'string' && config['connectionString'] !== '';
}

export default class DriverAzure implements Driver {
	private containerClient: ContainerClient;
	private root: string;
	private containerReady: Promise<unknown> | null = null;

	constructor(config: DriverConfig) {
		if (!isAzureConfig(config)) {
			throw new Error(`Missing connection string for container "${config.container}".`);
		}

		this.containerClient = BlobServiceClient.fromConnectionString(config.connectionString).getContainerClient(
			config.container,
		);

		this.root = config.root ? normalizePath(config.root, { removeLeading: true }) : '';
	}

	private fullPath(filepath: string): string {
		return normalizePath(this.root ? `${this.root}/${filepath}` : filepath, { removeLeading: true });
	}

	private ensureContainer(): Promise<unknown> {
		if (!this.containerReady) {
			this.containerReady = this.containerClient.createIfNotExists();
		}

		return this.containerReady;
	}

	async read(filepath: string): Promise<Readable> {
		const { readableStreamBody } = await this.containerClient.getBlobClient(this.fullPath(filepath)).download();

		if (!readableStreamBody) {
			throw new Error(`No stream returned for blob "${filepath}"`);
		}

		return Readable.from(readableStreamBody);
	}

	async write(filepath: string, content: WriteContent, type = 'application/octet-stream'): Promise<void> {
		await this.ensureContainer();

		const blockBlobClient = this.containerClient.getBlockBlobClient(this.fullPath(filepath));
		const options = { blobHTTPHeaders: { blobContentType: type } };

		if (isReadable(content)) {
			await blockBlobClient.uploadStream(content, undefined, undefined, options);
			return;
		}

		const buffer = toBuffer(content);
		await blockBlobClient.upload(buffer, buffer.byteLength, options);
	}

	async delete(filepath: string): Promise<void> {
		await this.containerClient.getBlockBlobClient(this.fullPath(filepath)).deleteIfExists();
	}

	async stat(filepath: string): Promise<Stat> {
		const props = await this.containerClient.getBlobClient(this.fullPath(filepath)).getProperties();

		return {
			size: props.contentLength ?? 0,
			modified: props.lastModified ?? new Date(0),
		};
	}

	async exists(filepath: string): Promise<boolean> {
		return this.containerClient.getBlockBlobClient(this.fullPath(filepath)).exists();
	}

	async *list(prefix = ''): AsyncIterable<string> {
		const prefixDirectory = this.fullPath(prefix);

		for await (const blob of this.containerClient.listBlobsFlat({ prefix: prefixDirectory })) {
			yield this.root ? blob.name.substring(this.root.length + 1) : blob.name;
		}
	}
}
