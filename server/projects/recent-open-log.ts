import { z } from "zod";
import type { Logger } from "../logger";
import { JsonStore } from "../store/json-store";
import type { RecentOpenEntry } from "./project-types";

export const DEFAULT_MAX_RECENT_OPENS = 20;

export const recentOpenLogSchema = z.array(
	z.object({ path: z.string(), opened_at: z.string() }),
);

export function createRecentOpenJsonStore(
	filePath: string,
	logger?: Logger,
): JsonStore<RecentOpenEntry[]> {
	return new JsonStore<RecentOpenEntry[]>(
		{ filePath, schema: recentOpenLogSchema, logger },
		[],
	);
}

/**
 * Projects opened through the dashboard, newest first.
 *
 * Only the open endpoint writes here; the rendered Recent row is built
 * from the editor's own storage and folder activity instead.
 */
export class RecentOpenLog {
	constructor(
		public store: JsonStore<RecentOpenEntry[]>,
		private readonly maxEntries: number = DEFAULT_MAX_RECENT_OPENS,
	) {}

	/** Move `path` to the front with a fresh timestamp, trimming to the cap. */
	async record(
		path: string,
		openedAt: Date = new Date(),
	): Promise<RecentOpenEntry[]> {
		return this.store.update((entries) => {
			const next = [
				{ path, opened_at: openedAt.toISOString() },
				...entries.filter((entry) => entry.path !== path),
			].slice(0, this.maxEntries);
			return { data: next, result: next };
		});
	}

	async list(): Promise<RecentOpenEntry[]> {
		return this.store.read();
	}
}
