/** Structural category for folders directly under the tracked root. */
export const OTHER_CATEGORY = "OTHER";

export type DescriptorStatus = "missing" | "loaded" | "malformed";

/**
 * Fields a project's descriptor file may carry. Every field is optional;
 * absent or wrongly typed fields fall back to defaults in resolveDescriptor.
 */
export interface ProjectDescriptor {
	id?: string;
	title?: string;
	oneLiner?: string;
	description?: string;
	categories?: string[];
	tags?: string[];
	kind?: string;
	status?: string;
}

/** Descriptor fields after defaults have been applied. */
export interface ResolvedDescriptor {
	id: string;
	title: string;
	oneLiner: string;
	categories: string[];
	tags: string[];
	kind: string;
	status: string;
}

/**
 * One project folder as discovered on disk.
 *
 * Used by: project-scanner, project-ranker
 */
export interface ScannedProject extends ResolvedDescriptor {
	/** Absolute filesystem path; unique key across every view */
	path: string;
	/** Path relative to the tracked root, for display */
	relPath: string;
	/** Configured category name, or OTHER for root-level folders */
	category: string;
	/** Latest mtime of the folder and its signal files, epoch ms */
	activityMs: number;
	hasDescriptor: boolean;
	descriptorStatus: DescriptorStatus;
	/** Absolute path of the screenshot, null when there is none */
	screenshotPath: string | null;
}

/** A scanned project merged with pin state and editor recency. */
export interface Project extends ScannedProject {
	pinned: boolean;
	/** Position in the editor's recent list (0 = most recent), null if absent */
	editorRecentRank: number | null;
}

export interface CategoryGroup {
	category: string;
	projects: Project[];
}

export interface RankedProjects {
	projects: Project[];
	pinned: Project[];
	recent: Project[];
	categories: CategoryGroup[];
}

export interface ProjectSummary {
	total: number;
	withDescriptor: number;
	pinned: number;
	editorRecent: number;
	byCategory: Array<{ category: string; count: number }>;
}

export interface RecentOpenEntry {
	path: string;
	/** ISO 8601 */
	opened_at: string;
}
