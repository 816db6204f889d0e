import {
	type CategoryGroup,
	OTHER_CATEGORY,
	type Project,
	type ProjectSummary,
	type RankedProjects,
	type ScannedProject,
} from "./project-types";

export interface RankInput {
	projects: readonly ScannedProject[];
	pinnedPaths: Iterable<string>;
	/** Editor recency signal, index 0 = most recent */
	editorRecent: readonly string[];
	/** Cap on the recent view */
	maxRecent: number;
	/** Configured category order, used to break ties between groups */
	categoryOrder?: readonly string[];
}

const byActivityDesc = (a: Project, b: Project) => b.activityMs - a.activityMs;

/**
 * Builds the three views over one project list. Views overlap: a project
 * can be pinned, recent and in its category row at the same time.
 */
export function rankProjects(input: RankInput): RankedProjects {
	const pinnedPaths = new Set(input.pinnedPaths);
	const editorRank = new Map<string, number>();
	input.editorRecent.forEach((path, index) => {
		if (!editorRank.has(path)) {
			editorRank.set(path, index);
		}
	});

	const projects: Project[] = input.projects.map((project) => ({
		...project,
		pinned: pinnedPaths.has(project.path),
		editorRecentRank: editorRank.get(project.path) ?? null,
	}));

	return {
		projects,
		pinned: projects.filter((project) => project.pinned).sort(byActivityDesc),
		recent: selectRecent(projects, input.maxRecent),
		categories: groupByCategory(projects, input.categoryOrder ?? []),
	};
}

/**
 * Editor-reported projects first in the editor's order, then everything
 * else by activity, capped at `maxRecent`.
 */
export function selectRecent(
	projects: readonly Project[],
	maxRecent: number,
): Project[] {
	const fromEditor: Project[] = [];
	const rest: Project[] = [];
	const placed = new Set<string>();

	for (const project of projects) {
		if (project.editorRecentRank !== null && !placed.has(project.path)) {
			fromEditor.push(project);
			placed.add(project.path);
		}
	}
	fromEditor.sort(
		(a, b) => (a.editorRecentRank ?? 0) - (b.editorRecentRank ?? 0),
	);

	for (const project of projects) {
		if (!placed.has(project.path)) {
			rest.push(project);
			placed.add(project.path);
		}
	}
	rest.sort(byActivityDesc);

	return [...fromEditor, ...rest].slice(0, Math.max(0, maxRecent));
}

/**
 * Groups by structural category, newest first within a group; groups are
 * ordered by their newest project. Ties keep the configured order with
 * OTHER last.
 */
export function groupByCategory(
	projects: readonly Project[],
	categoryOrder: readonly string[],
): CategoryGroup[] {
	const groups = new Map<string, Project[]>();
	for (const category of [...categoryOrder, OTHER_CATEGORY]) {
		groups.set(category, []);
	}
	for (const project of projects) {
		const group = groups.get(project.category);
		if (group) {
			group.push(project);
		} else {
			groups.set(project.category, [project]);
		}
	}

	const newest = (group: CategoryGroup) => group.projects[0]?.activityMs ?? 0;

	return [...groups.entries()]
		.filter(([, members]) => members.length > 0)
		.map(([category, members]) => ({
			category,
			projects: [...members].sort(byActivityDesc),
		}))
		.sort((a, b) => newest(b) - newest(a));
}

export function summarizeProjects(
	ranked: RankedProjects,
	categoryOrder: readonly string[],
): ProjectSummary {
	const counts = new Map<string, number>();
	for (const project of ranked.projects) {
		counts.set(project.category, (counts.get(project.category) ?? 0) + 1);
	}

	const order = [...categoryOrder, OTHER_CATEGORY];
	for (const category of counts.keys()) {
		if (!order.includes(category)) order.push(category);
	}

	return {
		total: ranked.projects.length,
		withDescriptor: ranked.projects.filter((project) => project.hasDescriptor)
			.length,
		pinned: ranked.pinned.length,
		editorRecent: ranked.projects.filter(
			(project) => project.editorRecentRank !== null,
		).length,
		byCategory: order.flatMap((category) => {
			const count = counts.get(category);
			return count ? [{ category, count }] : [];
		}),
	};
}
