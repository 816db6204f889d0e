import fastifyStatic from "@fastify/static";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { LauncherConfig } from "./config";
import {
	type DashboardRoutesDeps,
	registerDashboardRoutes,
} from "./api/dashboard/routes";

export interface AppDeps extends Omit<DashboardRoutesDeps, "outputFile"> {
	config: Pick<LauncherConfig, "dashboardDir" | "outputFile">;
	logger?: FastifyServerOptions["logger"];
}

/**
 * Wire the dashboard routes and static serving of the dashboard
 * directory. Path traversal outside that directory is refused by
 * @fastify/static.
 */
export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
	const { config, logger = false, ...routeDeps } = deps;
	const app = Fastify({ logger });

	await registerDashboardRoutes(app, {
		...routeDeps,
		outputFile: config.outputFile,
	});

	await app.register(fastifyStatic, {
		root: config.dashboardDir,
		prefix: "/",
	});

	return app;
}
