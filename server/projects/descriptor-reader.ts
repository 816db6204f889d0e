import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { errorCode, errorMessage } from "../errors";
import type { ProjectDescriptor, ResolvedDescriptor } from "./project-types";

const optionalString = z.string().optional().catch(undefined);

const optionalStringList = z
	.array(z.unknown())
	.transform((items) =>
		items.filter((item): item is string => typeof item === "string"),
	)
	.optional()
	.catch(undefined);

// A field of the wrong type is dropped rather than failing the whole file.
export const descriptorSchema = z.object({
	id: optionalString,
	title: optionalString,
	oneLiner: optionalString,
	description: optionalString,
	categories: optionalStringList,
	tags: optionalStringList,
	kind: optionalString,
	status: optionalString,
});

export type DescriptorResult =
	| { status: "missing" }
	| { status: "loaded"; descriptor: ProjectDescriptor }
	| { status: "malformed"; error: string };

/** Load `<projectDir>/<fileName>`. Never throws. */
export async function readDescriptor(
	projectDir: string,
	fileName: string,
): Promise<DescriptorResult> {
	let raw: string;
	try {
		raw = await readFile(join(projectDir, fileName), "utf-8");
	} catch (err: unknown) {
		const code = errorCode(err);
		if (code === "ENOENT" || code === "ENOTDIR") {
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

	const result = descriptorSchema.safeParse(parsed);
	if (!result.success) {
		return { status: "malformed", error: "descriptor is not a JSON object" };
	}
	return { status: "loaded", descriptor: result.data };
}

/**
 * Apply defaults: id and title fall back to the folder name, the one-liner
 * to `description` and then "", lists to [], kind to "project" and status
 * to "active".
 */
export function resolveDescriptor(
	folderName: string,
	result: DescriptorResult,
): ResolvedDescriptor {
	const descriptor: ProjectDescriptor =
		result.status === "loaded" ? result.descriptor : {};

	return {
		id: descriptor.id ?? folderName,
		title: descriptor.title ?? folderName,
		oneLiner: descriptor.oneLiner || descriptor.description || "",
		categories: descriptor.categories ?? [],
		tags: descriptor.tags ?? [],
		kind: descriptor.kind ?? "project",
		status: descriptor.status ?? "active",
	};
}
