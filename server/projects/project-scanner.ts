import type { Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, relative } from "node:path";
import { errorMessage } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { readDescriptor, resolveDescriptor } from "./descriptor-reader";
import { OTHER_CATEGORY, type ScannedProject } from "./project-types";

/**
 * Files whose mtime signals recent work in a project, checked directly
 * inside the project folder. Avoids walking the whole tree.
 */
export const SIGNAL_FILES = [
	".git/HEAD",
	".git/index",
	"package.json",
	"Cargo.toml",
	"pyproject.toml",
	"requirements.txt",
	"main.py",
	"index.js",
] as const;

export interface ScannerConfig {
	/** Absolute path of the tracked root */
	root: string;
	/** Category folder names under root, in precedence order */
	categories: readonly string[];
	/** Folder names never treated as projects */
	ignore: ReadonlySet<string>;
	descriptorFile: string;
	screenshotFile: string;
}

/**
 * Discovers projects under a two-level layout:
 *   <root>/<CATEGORY>/<project>   one project per category child
 *   <root>/<project>              anything else at root is OTHER
 *
 * Never recurses into a project's own folders.
 */
export class ProjectScanner {
	constructor(
		private readonly config: ScannerConfig,
		private readonly logger: Logger = silentLogger,
	) {}

	async scan(): Promise<ScannedProject[]> {
		const { root, categories, ignore } = this.config;
		const categoryNames = new Set(categories);
		const seen = new Set<string>();
		const projects: ScannedProject[] = [];

		const collect = async (dir: string, category: string) => {
			for (const name of await listDirectories(dir)) {
				if (ignore.has(name)) continue;
				if (category === OTHER_CATEGORY && categoryNames.has(name)) continue;

				const path = join(dir, name);
				if (seen.has(path)) continue;
				seen.add(path);

				const project = await this.createProject(path, name, category);
				if (project) {
					projects.push(project);
				}
			}
		};

		for (const category of categories) {
			await collect(join(root, category), category);
		}
		await collect(root, OTHER_CATEGORY);

		return projects;
	}

	private async createProject(
		path: string,
		name: string,
		category: string,
	): Promise<ScannedProject | null> {
		const { root, descriptorFile, screenshotFile } = this.config;

		let activityMs: number;
		try {
			activityMs = await readActivityMs(path);
		} catch (err: unknown) {
			this.logger.warn(`Skipping ${path}: ${errorMessage(err)}`);
			return null;
		}

		const descriptor = await readDescriptor(path, descriptorFile);
		if (descriptor.status === "malformed") {
			this.logger.warn(
				`Ignoring unreadable ${descriptorFile} in ${path}: ${descriptor.error}`,
			);
		}

		const screenshotPath = join(path, screenshotFile);
		const screenshot = await safeStat(screenshotPath);

		return {
			...resolveDescriptor(name, descriptor),
			path,
			relPath: relative(root, path),
			category,
			activityMs,
			hasDescriptor: descriptor.status !== "missing",
			descriptorStatus: descriptor.status,
			screenshotPath: screenshot?.isFile() ? screenshotPath : null,
		};
	}
}

/**
 * Folder mtime, raised to the newest mtime among SIGNAL_FILES.
 * Throws only when the folder itself cannot be stat'ed.
 */
export async function readActivityMs(projectDir: string): Promise<number> {
	let latest = (await stat(projectDir)).mtimeMs;
	for (const file of SIGNAL_FILES) {
		const fileStat = await safeStat(join(projectDir, file));
		if (fileStat && fileStat.mtimeMs > latest) {
			latest = fileStat.mtimeMs;
		}
	}
	return latest;
}

/** Names of child directories (following symlinks), sorted; [] if unreadable. */
async function listDirectories(dir: string): Promise<string[]> {
	let names: string[];
	try {
		names = await readdir(dir);
	} catch {
		// missing category folder or no permission: contributes nothing
		return [];
	}

	const directories: string[] = [];
	for (const name of names.sort()) {
		const entryStat = await safeStat(join(dir, name));
		if (entryStat?.isDirectory()) {
			directories.push(name);
		}
	}
	return directories;
}

async function safeStat(path: string): Promise<Stats | null> {
	try {
		return await stat(path);
	} catch {
		return null;
	}
}
