import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { AppError } from "./errors";

export const DEFAULT_CATEGORIES = [
	"RESEARCH",
	"TEACHING",
	"TOOLS",
	"PUZZLES",
	"HARDWARE",
];

export const DEFAULT_IGNORE = [
	".git",
	"node_modules",
	"venv",
	"__pycache__",
	".vscode",
	".cursor",
	"build",
	"dist",
	".DS_Store",
	"env",
	".env",
];

export const DEFAULT_PORT = 8847;

export const DESCRIPTOR_FILE = "catalogue.json";
export const SCREENSHOT_FILE = "screenshot.png";
export const PINNED_FILE = "pinned.json";
export const RECENT_OPEN_FILE = "recent.json";
export const OUTPUT_FILE = "dashboard.html";

export interface LauncherConfig {
	root: string;
	categories: string[];
	ignore: Set<string>;
	dashboardDir: string;
	port: number;
	host: string;
	editorCommand: string;
	editorStoragePath: string;
	maxRecent: number;
	maxRecentOpens: number;
	descriptorFile: string;
	screenshotFile: string;
	pinnedFile: string;
	recentOpenFile: string;
	outputFile: string;
}

type Env = Record<string, string | undefined>;

const commaList = z
	.string()
	.transform((value) =>
		value
			.split(",")
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const absolutePath = z
	.string()
	.min(1)
	.refine(isAbsolute, { message: "must be an absolute path" })
	.transform((value) => resolve(value));

const configSchema = z.object({
	root: absolutePath,
	categories: commaList,
	ignore: commaList,
	dashboardDir: absolutePath,
	port: z.coerce.number().int().min(0).max(65535),
	host: z.string().min(1),
	editorCommand: z.string().min(1),
	editorStoragePath: absolutePath,
	maxRecent: z.coerce.number().int().min(0),
	maxRecentOpens: z.coerce.number().int().min(1),
});

/** Where Cursor keeps its global storage on each platform. */
export function defaultEditorStoragePath(
	platform: NodeJS.Platform = process.platform,
	env: Env = process.env,
	home: string = homedir(),
): string {
	const tail = join("Cursor", "User", "globalStorage", "storage.json");
	if (platform === "darwin") {
		return join(home, "Library", "Application Support", tail);
	}
	if (platform === "win32") {
		return join(env.APPDATA ?? join(home, "AppData", "Roaming"), tail);
	}
	return join(env.XDG_CONFIG_HOME ?? join(home, ".config"), tail);
}

/**
 * Build the launcher configuration from environment variables, falling
 * back to defaults for anything unset.
 *
 * Throws AppError(INVALID_CONFIG) when a value does not validate.
 */
export function loadConfig(
	env: Env = process.env,
	home: string = homedir(),
): LauncherConfig {
	const result = configSchema.safeParse({
		root: env.LAUNCHPAD_ROOT ?? join(home, "Coding"),
		categories: env.LAUNCHPAD_CATEGORIES ?? DEFAULT_CATEGORIES.join(","),
		ignore: env.LAUNCHPAD_IGNORE ?? DEFAULT_IGNORE.join(","),
		dashboardDir: env.LAUNCHPAD_DASHBOARD_DIR ?? join(home, ".launchpad"),
		port: env.PORT ?? DEFAULT_PORT,
		host: env.HOST ?? "127.0.0.1",
		editorCommand: env.LAUNCHPAD_EDITOR ?? "cursor",
		editorStoragePath:
			env.LAUNCHPAD_EDITOR_STORAGE ??
			defaultEditorStoragePath(process.platform, env, home),
		maxRecent: env.LAUNCHPAD_MAX_RECENT ?? 10,
		maxRecentOpens: env.LAUNCHPAD_MAX_RECENT_OPENS ?? 20,
	});

	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new AppError("INVALID_CONFIG", `Invalid configuration: ${details}`);
	}

	const parsed = result.data;
	return {
		...parsed,
		categories: [...new Set(parsed.categories)],
		ignore: new Set(parsed.ignore),
		descriptorFile: DESCRIPTOR_FILE,
		screenshotFile: SCREENSHOT_FILE,
		pinnedFile: join(parsed.dashboardDir, PINNED_FILE),
		recentOpenFile: join(parsed.dashboardDir, RECENT_OPEN_FILE),
		outputFile: join(parsed.dashboardDir, OUTPUT_FILE),
	};
}
