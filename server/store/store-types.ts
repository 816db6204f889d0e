import type { z } from "zod";
import type { Logger } from "../logger";

export interface StoreConfig<T> {
	/** Path to JSON file */
	filePath: string;
	/** Shape the file contents must match */
	schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	/** Told when an existing file is ignored because it does not parse */
	logger?: Logger;
}

export type StoreReadResult<T> =
	| { status: "missing" }
	| { status: "loaded"; data: T }
	| { status: "malformed"; error: string };
