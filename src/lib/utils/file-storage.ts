// File-backed storage provider — one file per key under a cache directory
import { randomUUID } from 'node:crypto';
import { promises as nodeFs } from 'node:fs';
import os from 'node:os';
import { join } from 'node:path';
import { initSecureStorage, type SecureStorageProvider } from './secure-storage.js';

/** The slice of `fs.promises` the provider needs (memfs in tests) */
export interface StorageFs {
	readFile(path: string, encoding: BufferEncoding): Promise<string>;
	writeFile(path: string, data: string): Promise<void>;
	rename(from: string, to: string): Promise<void>;
	mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
	unlink(path: string): Promise<void>;
}

const defaultFs: StorageFs = {
	readFile: (path, encoding) => nodeFs.readFile(path, encoding),
	writeFile: (path, data) => nodeFs.writeFile(path, data),
	rename: (from, to) => nodeFs.rename(from, to),
	mkdir: async (path, options) => {
		await nodeFs.mkdir(path, options);
	},
	unlink: (path) => nodeFs.unlink(path)
};

export interface ResolveStorageDirDeps {
	env?: Record<string, string | undefined>;
	homedir?: () => string;
}

/** `$XDG_CACHE_HOME/<app>` or `~/.cache/<app>` */
export function resolveStorageDir(appName: string, deps?: ResolveStorageDirDeps): string {
	const xdgCacheHome = (deps?.env ?? process.env).XDG_CACHE_HOME;
	const home = deps?.homedir ? deps.homedir() : os.homedir();
	return xdgCacheHome ? join(xdgCacheHome, appName) : join(home, '.cache', appName);
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Durable provider for Node. Writes go to a temp file that is renamed over
 * the target, so a reader sees the previous value or the new one.
 */
export class FileStorageProvider implements SecureStorageProvider {
	private readonly fs: StorageFs;

	constructor(
		private readonly dir: string,
		deps?: { fs?: StorageFs }
	) {
		this.fs = deps?.fs ?? defaultFs;
	}

	private pathFor(key: string): string {
		return join(this.dir, `${encodeURIComponent(key)}.json`);
	}

	async get(key: string): Promise<string | null> {
		try {
			return await this.fs.readFile(this.pathFor(key), 'utf8');
		} catch (err) {
			if (isNotFound(err)) return null;
			throw err;
		}
	}

	async set(key: string, value: string): Promise<void> {
		const target = this.pathFor(key);
		// One temp file per write; concurrent writers of a key never share one
		const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
		await this.fs.mkdir(this.dir, { recursive: true });
		try {
			await this.fs.writeFile(temp, value);
			await this.fs.rename(temp, target);
		} catch (err) {
			await this.unlinkIfPresent(temp);
			throw err;
		}
	}

	async remove(key: string): Promise<void> {
		await this.unlinkIfPresent(this.pathFor(key));
	}

	private async unlinkIfPresent(path: string): Promise<void> {
		try {
			await this.fs.unlink(path);
		} catch (err) {
			if (!isNotFound(err)) throw err;
		}
	}
}

/** Make a file provider under the app's cache directory the active storage */
export function initFileStorage(
	appName: string,
	deps?: ResolveStorageDirDeps & { fs?: StorageFs }
): FileStorageProvider {
	const provider = new FileStorageProvider(resolveStorageDir(appName, deps), { fs: deps?.fs });
	initSecureStorage(provider);
	return provider;
}
