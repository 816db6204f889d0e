import { z } from "zod";
import type { Logger } from "../logger";
import { JsonStore } from "../store/json-store";

// Entries that are not strings are dropped; the rest of the list survives.
export const pinnedListSchema = z
	.array(z.unknown())
	.transform((items) =>
		items.filter((item): item is string => typeof item === "string"),
	);

export function createPinnedJsonStore(
	filePath: string,
	logger?: Logger,
): JsonStore<string[]> {
	return new JsonStore<string[]>(
		{ filePath, schema: pinnedListSchema, logger },
		[],
	);
}

/**
 * Pinned project paths, persisted as a JSON array in insertion order.
 * Each path appears at most once.
 */
export class PinnedStore {
	constructor(public store: JsonStore<string[]>) {}

	/** Flip membership of `path`. Returns the new pinned state. */
	async toggle(path: string): Promise<boolean> {
		return this.store.update((pinned) => {
			if (pinned.includes(path)) {
				return {
					data: pinned.filter((entry) => entry !== path),
					result: false,
				};
			}
			return { data: [...unique(pinned), path], result: true };
		});
	}

	async list(): Promise<string[]> {
		return unique(await this.store.read());
	}

	async isPinned(path: string): Promise<boolean> {
		return (await this.store.read()).includes(path);
	}
}

function unique(paths: readonly string[]): string[] {
	return [...new Set(paths)];
}
