import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { errorCode, errorMessage } from "../errors";

/**
 * Reads the editor's own record of recently opened workspaces.
 *
 * The editor (Cursor, a VS Code fork) keeps a global `storage.json`; the
 * part used here is `backupWorkspaces.folders[].folderUri`, a list of
 * `file://` URIs, most recent first. The file belongs to the editor and
 * is never written.
 */

const folderEntrySchema = z.object({ folderUri: z.string() });

const editorStorageSchema = z.object({
	backupWorkspaces: z
		.object({ folders: z.array(z.unknown()).optional() })
		.optional(),
});

export type EditorRecentResult =
	| { status: "missing" }
	| { status: "loaded"; paths: string[] }
	| { status: "malformed"; error: string };

export async function readEditorRecent(
	storagePath: string,
	root: string,
): Promise<EditorRecentResult> {
	let raw: string;
	try {
		raw = await readFile(storagePath, "utf-8");
	} catch (err: unknown) {
		if (errorCode(err) === "ENOENT") {
			return { status: "missing" };
		}
		return { status: "malformed", error: errorMessage(err) };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err: unknown) {
		return { status: "malformed", error: errorMessage(err) };
	}

	const storage = editorStorageSchema.safeParse(parsed);
	if (!storage.success) {
		return {
			status: "malformed",
			error: "unexpected shape for backupWorkspaces.folders",
		};
	}

	const folders = storage.data.backupWorkspaces?.folders ?? [];
	return { status: "loaded", paths: extractWorkspacePaths(folders, root) };
}

/** Decode folder URIs, keep those under `root`, drop repeats. */
export function extractWorkspacePaths(
	folders: readonly unknown[],
	root: string,
): string[] {
	const trackedRoot = resolve(root);
	const seen = new Set<string>();
	const paths: string[] = [];

	for (const folder of folders) {
		const entry = folderEntrySchema.safeParse(folder);
		if (!entry.success) continue;

		const path = fileUriToPath(entry.data.folderUri);
		if (path === null) continue;
		if (!isWithin(trackedRoot, path)) continue;
		if (seen.has(path)) continue;

		seen.add(path);
		paths.push(path);
	}

	return paths;
}

function fileUriToPath(uri: string): string | null {
	if (!uri.startsWith("file://")) {
		return null;
	}
	try {
		return resolve(fileURLToPath(uri));
	} catch {
		// remote or otherwise undecodable workspace
		return null;
	}
}

export function isWithin(root: string, path: string): boolean {
	const rel = relative(root, path);
	return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}
