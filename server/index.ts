import { mkdir } from "node:fs/promises";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { generateDashboard } from "./generate/dashboard-generator";
import { createEditorLauncher } from "./launcher/editor-launcher";
import { releasePort } from "./launcher/port-guard";
import { createConsoleLogger } from "./logger";
import { PinnedStore, createPinnedJsonStore } from "./projects/pinned-store";
import {
	RecentOpenLog,
	createRecentOpenJsonStore,
} from "./projects/recent-open-log";

async function main() {
	const config = loadConfig();
	const logger = createConsoleLogger("server");

	releasePort(config.port, { logger });

	const pinnedStore = new PinnedStore(
		createPinnedJsonStore(config.pinnedFile, logger),
	);
	const recentOpenLog = new RecentOpenLog(
		createRecentOpenJsonStore(config.recentOpenFile, logger),
		config.maxRecentOpens,
	);
	// Overlapping toggles share dashboard.html.tmp; run one generation at a time.
	let generating: Promise<unknown> = Promise.resolve();
	const regenerate = () => {
		const run = () =>
			generateDashboard({
				config,
				pinnedStore,
				logger: createConsoleLogger("generate"),
			});
		const next = generating.then(run, run);
		generating = next.catch(() => undefined);
		return next;
	};

	await mkdir(config.dashboardDir, { recursive: true });
	logger.info("Regenerating dashboard...");
	try {
		await regenerate();
	} catch (error) {
		logger.warn(`Could not regenerate dashboard: ${errorMessage(error)}`);
	}

	const app = await buildApp({
		config,
		logger: true,
		pinnedStore,
		recentOpenLog,
		regenerate,
		launcher: createEditorLauncher({
			command: config.editorCommand,
			logger: createConsoleLogger("editor"),
		}),
	});

	// Start server
	await app.listen({ port: config.port, host: config.host });
	const url = `http://localhost:${config.port}`;
	console.log(`Project Launchpad running at ${url}`);
	console.log("  Click a project to open it in the editor");
	console.log("  ⌘/Ctrl+Click to open it in a new editor window");
	console.log("  Press Ctrl+C to stop the server");

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		console.log(`\n[server] Received ${signal}, shutting down...`);
		try {
			await app.close();
			process.exit(0);
		} catch (error) {
			console.error("[server] Shutdown failed:", error);
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
