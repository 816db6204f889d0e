import { loadConfig } from "./config";
import { generateDashboard } from "./generate/dashboard-generator";
import { createConsoleLogger } from "./logger";
import { PinnedStore, createPinnedJsonStore } from "./projects/pinned-store";

// Always exits 0 once configuration loads: an empty root is not an error.
async function main() {
	const config = loadConfig();
	const logger = createConsoleLogger("generate");
	const pinnedStore = new PinnedStore(
		createPinnedJsonStore(config.pinnedFile, logger),
	);

	await generateDashboard({ config, pinnedStore, logger });
}

main().catch((err) => {
	console.error("[generate] Failed to generate dashboard:", err);
	process.exit(1);
});
