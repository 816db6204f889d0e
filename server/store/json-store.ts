import type { StoreConfig, StoreReadResult } from "./store-types";
import { mkdir, rename, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorCode, errorMessage } from "../errors";

export class JsonStore<T> {
	private config: StoreConfig<T>;
	private defaultData: T;
	private queue: Promise<unknown> = Promise.resolve();

	constructor(config: StoreConfig<T>, defaultData: T) {
		this.config = config;
		this.defaultData = defaultData;
	}

	/** Read the file and report whether it was absent, valid, or unusable. */
	async load(): Promise<StoreReadResult<T>> {
		let raw: string;
		try {
			raw = await readFile(this.config.filePath, "utf-8");
		} catch (err: unknown) {
			if (errorCode(err) === "ENOENT") {
				return { status: "missing" };
			}
			return { status: "malformed", error: errorMessage(err) };
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err: unknown) {
			return { status: "malformed", error: errorMessage(err) };
		}

		const result = this.config.schema.safeParse(parsed);
		if (!result.success) {
			return { status: "malformed", error: result.error.message };
		}
		return { status: "loaded", data: result.data };
	}

	/**
	 * Current contents, or a fresh copy of the default when absent or
	 * unusable. An unusable file is reported to the configured logger.
	 */
	async read(): Promise<T> {
		const result = await this.load();
		if (result.status === "loaded") {
			return result.data;
		}
		if (result.status === "malformed") {
			this.config.logger?.warn(
				`Ignoring unreadable ${this.config.filePath}: ${result.error}`,
			);
		}
		return structuredClone(this.defaultData);
	}

	async write(data: T): Promise<void> {
		await this.atomicWrite(data);
	}

	/**
	 * Read-modify-write under the store's queue. Calls made from the same
	 * process run one at a time in call order; other processes writing the
	 * same file are not coordinated.
	 */
	update<R>(mutate: (current: T) => { data: T; result: R }): Promise<R> {
		const run = async (): Promise<R> => {
			const current = await this.read();
			const { data, result } = mutate(current);
			await this.atomicWrite(data);
			return result;
		};
		const next = this.queue.then(run, run);
		this.queue = next.catch(() => undefined);
		return next;
	}

	private async atomicWrite(data: T): Promise<void> {
		const dir = dirname(this.config.filePath);
		await mkdir(dir, { recursive: true });
		const tmpPath = `${this.config.filePath}.tmp`;
		await writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
		await rename(tmpPath, this.config.filePath);
	}
}
