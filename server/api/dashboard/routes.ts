import { access } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type {
	ErrorResponse,
	OpenProjectResponse,
	TogglePinResponse,
} from "../../../shared/types";
import { errorMessage } from "../../errors";
import type { EditorLauncher } from "../../launcher/editor-launcher";
import type { PinnedStore } from "../../projects/pinned-store";
import type { RecentOpenLog } from "../../projects/recent-open-log";

export interface DashboardRoutesDeps {
	pinnedStore: Pick<PinnedStore, "toggle">;
	recentOpenLog: Pick<RecentOpenLog, "record">;
	launcher: EditorLauncher;
	/** Rebuild dashboard.html after the pinned list changes */
	regenerate: () => Promise<unknown>;
	/** Absolute path of the generated dashboard.html */
	outputFile: string;
	pathExists?: (path: string) => Promise<boolean>;
}

// A repeated parameter arrives as an array; the first occurrence wins.
const firstValue = z
	.union([z.string(), z.array(z.string())])
	.transform((value) => (Array.isArray(value) ? value[0] : value));

const pathParam = firstValue.pipe(z.string().min(1));

const togglePinQuerySchema = z.object({
	path: pathParam,
});

const openQuerySchema = z.object({
	path: pathParam,
	new: firstValue.optional(),
});

export async function defaultPathExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

function sendJson(
	reply: FastifyReply,
	code: number,
	body: ErrorResponse | TogglePinResponse | OpenProjectResponse,
) {
	return reply
		.code(code)
		.header("Access-Control-Allow-Origin", "*")
		.type("application/json")
		.send(body);
}

/**
 * Request handlers are independent: each reads the current file state,
 * mutates it and responds. Mutations go through the stores' in-process
 * queues.
 */
export async function registerDashboardRoutes(
	app: FastifyInstance,
	deps: DashboardRoutesDeps,
): Promise<void> {
	const pathExists = deps.pathExists ?? defaultPathExists;

	app.get("/toggle-pin", async (req, reply) => {
		const query = togglePinQuerySchema.safeParse(req.query);
		if (!query.success) {
			return sendJson(reply, 400, {
				status: "error",
				message: "No path provided",
			});
		}

		const { path } = query.data;
		let pinned: boolean;
		try {
			pinned = await deps.pinnedStore.toggle(path);
		} catch (err: unknown) {
			req.log.error(`Could not update pinned list: ${errorMessage(err)}`);
			return sendJson(reply, 500, {
				status: "error",
				message: `Could not update pinned list: ${errorMessage(err)}`,
			});
		}
		req.log.info(`${pinned ? "Pinned" : "Unpinned"}: ${path}`);

		try {
			await deps.regenerate();
		} catch (err: unknown) {
			req.log.error(`Could not regenerate dashboard: ${errorMessage(err)}`);
		}

		return sendJson(reply, 200, { status: "ok", pinned });
	});

	app.get("/open-in-cursor", async (req, reply) => {
		const query = openQuerySchema.safeParse(req.query);
		if (!query.success || !(await pathExists(query.data.path))) {
			return sendJson(reply, 400, {
				status: "error",
				message: "Invalid path",
			});
		}

		const { path } = query.data;
		deps.launcher.open(path, { newWindow: query.data.new === "true" });
		try {
			await deps.recentOpenLog.record(path);
		} catch (err: unknown) {
			req.log.warn(`Could not record open of ${path}: ${errorMessage(err)}`);
		}

		return sendJson(reply, 200, { status: "ok" });
	});

	app.get("/", async (_req, reply) => {
		if (!(await defaultPathExists(deps.outputFile))) {
			return sendJson(reply, 404, {
				status: "error",
				message: "Dashboard has not been generated yet",
			});
		}
		return reply.sendFile(basename(deps.outputFile), dirname(deps.outputFile));
	});
}
