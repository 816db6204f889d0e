import { type SpawnOptions, spawn } from "node:child_process";
import { errorCode, errorMessage } from "../errors";
import type { Logger } from "../logger";

/** The part of a ChildProcess the launcher touches. */
export interface SpawnedProcess {
	on(event: "error", listener: (err: Error) => void): unknown;
	unref(): void;
}

export type SpawnFn = (
	command: string,
	args: readonly string[],
	options: SpawnOptions,
) => SpawnedProcess;

export interface EditorLauncherOptions {
	/** Editor CLI on PATH, e.g. "cursor" */
	command: string;
	logger: Logger;
	spawn?: SpawnFn;
}

export interface OpenOptions {
	newWindow: boolean;
}

export interface EditorLauncher {
	/** Fire-and-forget: never waits for the editor and never throws. */
	open(path: string, options: OpenOptions): void;
}

export function editorArgs(path: string, options: OpenOptions): string[] {
	return options.newWindow ? ["-n", path] : [path];
}

export function createEditorLauncher(
	options: EditorLauncherOptions,
): EditorLauncher {
	const { command, logger } = options;
	const spawnProcess: SpawnFn = options.spawn ?? spawn;

	const reportFailure = (err: unknown) => {
		if (errorCode(err) === "ENOENT") {
			logger.error(
				`'${command}' command not found. Install the editor's shell command and make sure it is on PATH.`,
			);
			return;
		}
		logger.error(`Error opening ${command}: ${errorMessage(err)}`);
	};

	return {
		open(path, openOptions) {
			try {
				const child = spawnProcess(command, editorArgs(path, openOptions), {
					detached: true,
					stdio: "ignore",
				});
				child.on("error", reportFailure);
				child.unref();
				logger.info(
					`Opened in ${command}${openOptions.newWindow ? " (new window)" : ""}: ${path}`,
				);
			} catch (err: unknown) {
				reportFailure(err);
			}
		},
	};
}
