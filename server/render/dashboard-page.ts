import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import type {
	CategoryGroup,
	Project,
	ProjectSummary,
} from "../projects/project-types";
import { escapeHtml } from "./html";

export interface DashboardView {
	pinned: readonly Project[];
	recent: readonly Project[];
	categories: readonly CategoryGroup[];
	summary: ProjectSummary;
}

export interface RenderOptions {
	generatedAt: Date;
	/** Stylesheet text inlined into <style> */
	styles: string;
	/** Client script text inlined into <script> */
	script: string;
	/** Editor CLI, used by the page's file-mode fallbacks */
	editorCommand: string;
	/** Returns a data: URI for the image, or null when it cannot be read */
	readScreenshot?: (path: string) => string | null;
}

const PAGE_TITLE = "Project Launchpad";

const CATEGORY_EMOJI: Record<string, string> = {
	RESEARCH: "🔬",
	TEACHING: "📚",
	TOOLS: "🛠️",
	PUZZLES: "🧩",
	HARDWARE: "🔧",
	OTHER: "📂",
};

const IMAGE_TYPES: Record<string, string> = {
	".png": "image/png",
	".jpg": "image/jpeg",
	".jpeg": "image/jpeg",
	".gif": "image/gif",
	".webp": "image/webp",
};

const MAX_CARD_TAGS = 3;

// Editors whose URL handler is not named after their CLI.
const EDITOR_URL_SCHEMES: Record<string, string> = {
	code: "vscode",
	"code-insiders": "vscode-insiders",
};

/** Reads an image from disk as a base64 data URI; null on any failure. */
export function readScreenshotDataUri(path: string): string | null {
	try {
		const mime = IMAGE_TYPES[extname(path).toLowerCase()] ?? "image/png";
		return `data:${mime};base64,${readFileSync(path).toString("base64")}`;
	} catch {
		return null;
	}
}

/** URL scheme that opens a file in the editor, e.g. `cursor://file/<path>`. */
export function editorUrlScheme(command: string): string {
	const name = basename(command);
	return EDITOR_URL_SCHEMES[name] ?? name;
}

export function categoryEmoji(category: string): string {
	return CATEGORY_EMOJI[category] ?? "📁";
}

export function categoryClass(category: string): string {
	return `cat-${category.toLowerCase().replace(/[^a-z0-9_-]+/g, "-")}`;
}

/** "January 5, 2026 at 09:07", local time. */
export function formatGeneratedAt(date: Date): string {
	const month = new Intl.DateTimeFormat("en-US", { month: "long" }).format(
		date,
	);
	const hours = String(date.getHours()).padStart(2, "0");
	const minutes = String(date.getMinutes()).padStart(2, "0");
	return `${month} ${date.getDate()}, ${date.getFullYear()} at ${hours}:${minutes}`;
}

interface CardOptions {
	/** Show the structural category badge (pinned and recent rows) */
	showCategory?: boolean;
}

export function renderCard(
	project: Project,
	readScreenshot: (path: string) => string | null,
	options: CardOptions = {},
): string {
	const { showCategory = false } = options;
	const title = escapeHtml(project.title);
	const path = escapeHtml(project.path);

	const imageData = project.screenshotPath
		? readScreenshot(project.screenshotPath)
		: null;
	const image = imageData
		? `<img src="${imageData}" alt="${title}" class="screenshot">`
		: `<div class="no-screenshot">📁</div>`;

	const badges = [
		project.hasDescriptor
			? `<span class="badge catalogue" title="Has catalogue">📋</span>`
			: "",
		showCategory
			? `<span class="badge ${categoryClass(project.category)}">${escapeHtml(project.category)}</span>`
			: "",
	].join("");

	const tags =
		project.tags.length > 0
			? `<div class="tags">${project.tags
					.slice(0, MAX_CARD_TAGS)
					.map((tag) => `<span class="tag">${escapeHtml(tag)}</span>`)
					.join("")}</div>`
			: "";

	const pinClass = project.pinned ? " pinned" : "";
	return `
<div class="project-card${pinClass}" data-path="${path}" data-id="${escapeHtml(project.id)}">
	<div class="screenshot-container" data-action="open">
		${image}
		<div class="badges">${badges}</div>
	</div>
	<div class="project-info" data-action="open">
		<h3>${title}</h3>
		<p class="one-liner">${escapeHtml(project.oneLiner || "No description")}</p>
		<p class="project-path">${escapeHtml(project.relPath)}</p>
		${tags}
	</div>
	<button class="pin-btn${pinClass}" data-action="pin" title="${project.pinned ? "Unpin" : "Pin"} this project">${project.pinned ? "📌" : "📍"}</button>
</div>`;
}

function renderRow(
	id: string,
	rowClass: string,
	heading: string,
	headingClass: string,
	cards: string[],
): string {
	return `
<div class="category-row ${rowClass}" id="category-${escapeHtml(id)}">
	<div class="row-header">
		<h2 class="${headingClass}">${heading}</h2>
		<span class="count">${cards.length} projects</span>
	</div>
	<div class="row-content">${cards.join("")}</div>
</div>`;
}

/**
 * Render the whole dashboard as one self-contained HTML document.
 * Output depends only on the inputs (the generation time included).
 */
export function renderDashboard(
	view: DashboardView,
	options: RenderOptions,
): string {
	const readScreenshot = options.readScreenshot ?? readScreenshotDataUri;

	const rows: string[] = [];
	if (view.pinned.length > 0) {
		rows.push(
			renderRow(
				"pinned",
				"row-pinned",
				"📌 Pinned",
				"cat-pinned",
				view.pinned.map((project) =>
					renderCard(project, readScreenshot, { showCategory: true }),
				),
			),
		);
	}
	if (view.recent.length > 0) {
		rows.push(
			renderRow(
				"recent",
				"row-recent",
				"🕐 Recent",
				"cat-recent",
				view.recent.map((project) =>
					renderCard(project, readScreenshot, { showCategory: true }),
				),
			),
		);
	}
	view.categories.forEach((group, index) => {
		rows.push(
			renderRow(
				group.category,
				index % 2 === 0 ? "row-even" : "row-odd",
				`${categoryEmoji(group.category)} ${escapeHtml(group.category)}`,
				categoryClass(group.category),
				group.projects.map((project) => renderCard(project, readScreenshot)),
			),
		);
	});

	const { summary } = view;

	return `<!DOCTYPE html>
<html lang="en">
<head>
	<meta charset="UTF-8">
	<meta name="viewport" content="width=device-width, initial-scale=1.0">
	<title>${PAGE_TITLE}</title>
	<style>
${options.styles}
	</style>
</head>
<body data-editor="${escapeHtml(options.editorCommand)}" data-editor-scheme="${escapeHtml(editorUrlScheme(options.editorCommand))}">
	<div class="main-layout">
		<main class="main-content">
			<header>
				<h1>${PAGE_TITLE}</h1>
				<p>Click to open • ⌘+Click for new window • 📍 to pin</p>
				<div class="stats">
					<div class="stat">📁 ${summary.total} Projects</div>
					<div class="stat">📋 ${summary.withDescriptor} with catalogue</div>
					<div class="stat">📌 ${summary.pinned} Pinned</div>
					<div class="stat" id="serverStatus">⏳</div>
				</div>
			</header>
			<div class="search-box">
				<input type="text" id="searchInput" placeholder="Search projects...">
			</div>
			<div class="categories-container">${rows.join("")}
			</div>
			<footer>
				<p>Generated ${formatGeneratedAt(options.generatedAt)}</p>
			</footer>
		</main>
	</div>
	<script>
${options.script}
	</script>
</body>
</html>
`;
}
