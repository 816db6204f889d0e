import { spawnSync } from "node:child_process";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";

export type CommandResult = {
	status: number | null;
	stdout: string;
};

export interface PortGuardDeps {
	logger: Logger;
	run?: (command: string, args: string[]) => CommandResult;
	kill?: (pid: number, signal: NodeJS.Signals) => void;
	selfPid?: number;
}

function runCommand(command: string, args: string[]): CommandResult {
	const result = spawnSync(command, args, { encoding: "utf8" });
	return { status: result.status, stdout: result.stdout ?? "" };
}

/**
 * Force-stop whatever process is listening on `port` so only one
 * launcher server runs at a time. Uses `lsof`; where it is unavailable
 * nothing happens. Returns the PIDs that were killed.
 */
export function releasePort(port: number, deps: PortGuardDeps): number[] {
	const run = deps.run ?? runCommand;
	const kill = deps.kill ?? ((pid, signal) => process.kill(pid, signal));
	const selfPid = deps.selfPid ?? process.pid;

	const result = run("lsof", ["-ti", `:${port}`]);
	if (result.status !== 0) {
		// lsof exits 1 when nothing holds the port, or is missing entirely
		return [];
	}

	const pids = result.stdout
		.split(/\s+/)
		.map((token) => Number.parseInt(token, 10))
		.filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== selfPid);

	const killed: number[] = [];
	for (const pid of new Set(pids)) {
		try {
			kill(pid, "SIGKILL");
			killed.push(pid);
			deps.logger.info(`Killed existing server (PID ${pid})`);
		} catch (err: unknown) {
			deps.logger.warn(`Could not stop PID ${pid}: ${errorMessage(err)}`);
		}
	}
	return killed;
}
