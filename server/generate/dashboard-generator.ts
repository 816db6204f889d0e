import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { LauncherConfig } from "../config";
import type { Logger } from "../logger";
import { readEditorRecent } from "../projects/editor-recent";
import type { PinnedStore } from "../projects/pinned-store";
import { ProjectScanner } from "../projects/project-scanner";
import { rankProjects, summarizeProjects } from "../projects/project-ranker";
import type { ProjectSummary } from "../projects/project-types";
import { renderDashboard } from "../render/dashboard-page";

export const CLIENT_DIR = fileURLToPath(new URL("../../client", import.meta.url));

export interface DashboardAssets {
	styles: string;
	script: string;
}

export type GeneratorConfig = Pick<
	LauncherConfig,
	| "root"
	| "categories"
	| "ignore"
	| "descriptorFile"
	| "screenshotFile"
	| "editorStoragePath"
	| "editorCommand"
	| "maxRecent"
	| "outputFile"
>;

export interface GeneratorDeps {
	config: GeneratorConfig;
	pinnedStore: Pick<PinnedStore, "list">;
	logger: Logger;
	now?: () => Date;
	loadAssets?: () => Promise<DashboardAssets>;
	readScreenshot?: (path: string) => string | null;
}

export interface GenerateResult {
	written: boolean;
	outputPath: string;
	summary: ProjectSummary | null;
}

export async function loadClientAssets(
	clientDir: string = CLIENT_DIR,
): Promise<DashboardAssets> {
	const [styles, script] = await Promise.all([
		readFile(join(clientDir, "dashboard.css"), "utf-8"),
		readFile(join(clientDir, "dashboard.js"), "utf-8"),
	]);
	return { styles, script };
}

/**
 * Scan the tracked root and write a fresh dashboard.html.
 * Writes nothing when no projects are found.
 */
export async function generateDashboard(
	deps: GeneratorDeps,
): Promise<GenerateResult> {
	const { config, logger } = deps;
	const outputPath = config.outputFile;

	logger.info(`Scanning ${config.root} for projects...`);
	const [pinnedPaths, editorRecent] = await Promise.all([
		deps.pinnedStore.list(),
		loadEditorRecent(config, logger),
	]);

	const scanner = new ProjectScanner(config, logger);
	const scanned = await scanner.scan();
	if (scanned.length === 0) {
		logger.info("No projects found!");
		return { written: false, outputPath, summary: null };
	}

	const ranked = rankProjects({
		projects: scanned,
		pinnedPaths,
		editorRecent,
		maxRecent: config.maxRecent,
		categoryOrder: config.categories,
	});
	const summary = summarizeProjects(ranked, config.categories);

	logger.info(`Found ${summary.total} projects`);
	logger.info(`${summary.pinned} pinned`);
	logger.info(`${summary.withDescriptor} with ${config.descriptorFile}`);
	logger.info(`${summary.editorRecent} in the editor's recent list`);

	const assets = await (deps.loadAssets ?? loadClientAssets)();
	const html = renderDashboard(
		{
			pinned: ranked.pinned,
			recent: ranked.recent,
			categories: ranked.categories,
			summary,
		},
		{
			generatedAt: (deps.now ?? (() => new Date()))(),
			styles: assets.styles,
			script: assets.script,
			editorCommand: config.editorCommand,
			readScreenshot: deps.readScreenshot,
		},
	);

	await mkdir(dirname(outputPath), { recursive: true });
	const tmpPath = `${outputPath}.tmp`;
	await writeFile(tmpPath, html, "utf-8");
	await rename(tmpPath, outputPath);
	logger.info(`Dashboard generated: ${outputPath}`);

	logger.info("Projects by category:");
	for (const { category, count } of summary.byCategory) {
		logger.info(`  ${category}: ${count}`);
	}

	return { written: true, outputPath, summary };
}

async function loadEditorRecent(
	config: GeneratorConfig,
	logger: Logger,
): Promise<string[]> {
	const result = await readEditorRecent(config.editorStoragePath, config.root);
	if (result.status === "malformed") {
		logger.warn(`Could not read editor storage: ${result.error}`);
		return [];
	}
	return result.status === "loaded" ? result.paths : [];
}
