import type { FastifyInstance } from "fastify";
import {
	type Mock,
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	vi,
} from "vitest";
import {
	existsSync,
	mkdirSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { buildApp } from "../../../server/app";
import type { EditorLauncher } from "../../../server/launcher/editor-launcher";
import {
	PinnedStore,
	createPinnedJsonStore,
} from "../../../server/projects/pinned-store";
import {
	RecentOpenLog,
	createRecentOpenJsonStore,
} from "../../../server/projects/recent-open-log";
import { makeTempRoot } from "../../helpers/project-tree";

describe("Dashboard routes", () => {
	let app: FastifyInstance | null = null;
	let tempDir: string;
	let dashboardDir: string;
	let pinnedFile: string;
	let recentFile: string;
	let outputFile: string;
	let projectDir: string;
	let open: Mock<EditorLauncher["open"]>;
	let regenerate: Mock<() => Promise<unknown>>;

	const get = async (url: string) => {
		if (app === null) throw new Error("app not built");
		return app.inject({ method: "GET", url });
	};

	const readJson = (path: string): unknown =>
		JSON.parse(readFileSync(path, "utf-8"));

	beforeEach(async () => {
		tempDir = makeTempRoot();
		dashboardDir = join(tempDir, "dashboard");
		mkdirSync(dashboardDir);
		pinnedFile = join(dashboardDir, "pinned.json");
		recentFile = join(dashboardDir, "recent.json");
		outputFile = join(dashboardDir, "dashboard.html");
		projectDir = join(tempDir, "Coding", "RESEARCH", "foo");
		mkdirSync(projectDir, { recursive: true });

		open = vi.fn<EditorLauncher["open"]>();
		regenerate = vi
			.fn<() => Promise<unknown>>()
			.mockResolvedValue(undefined);

		app = await buildApp({
			config: { dashboardDir, outputFile },
			pinnedStore: new PinnedStore(createPinnedJsonStore(pinnedFile)),
			recentOpenLog: new RecentOpenLog(createRecentOpenJsonStore(recentFile)),
			launcher: { open },
			regenerate,
		});
		await app.ready();
	});

	afterEach(async () => {
		if (app !== null) {
			await app.close();
			app = null;
		}
		rmSync(tempDir, { recursive: true, force: true });
	});

	describe("GET /toggle-pin", () => {
		it("pins then unpins a path, persisting each state", async () => {
			const first = await get(`/toggle-pin?path=${encodeURIComponent("/root/X")}`);

			expect(first.statusCode).toBe(200);
			expect(first.json()).toEqual({ status: "ok", pinned: true });
			expect(readJson(pinnedFile)).toEqual(["/root/X"]);

			const second = await get(`/toggle-pin?path=${encodeURIComponent("/root/X")}`);

			expect(second.statusCode).toBe(200);
			expect(second.json()).toEqual({ status: "ok", pinned: false });
			expect(readJson(pinnedFile)).toEqual([]);
		});

		it("regenerates the dashboard after each toggle", async () => {
			await get("/toggle-pin?path=%2Froot%2FX");

			expect(regenerate).toHaveBeenCalledTimes(1);
		});

		it("still answers when regeneration fails", async () => {
			regenerate.mockRejectedValueOnce(new Error("disk full"));

			const response = await get("/toggle-pin?path=%2Froot%2FX");

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({ status: "ok", pinned: true });
		});

		it.each(["/toggle-pin", "/toggle-pin?path="])(
			"rejects %s with 400",
			async (url) => {
				const response = await get(url);

				expect(response.statusCode).toBe(400);
				expect(response.json()).toEqual({
					status: "error",
					message: "No path provided",
				});
				expect(existsSync(pinnedFile)).toBe(false);
				expect(regenerate).not.toHaveBeenCalled();
			},
		);

		it("takes the first path when the parameter is repeated", async () => {
			const response = await get("/toggle-pin?path=%2Fa&path=%2Fb");

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({ status: "ok", pinned: true });
			expect(readJson(pinnedFile)).toEqual(["/a"]);
		});

		it("keeps existing pins when the file holds a stray entry", async () => {
			writeFileSync(pinnedFile, JSON.stringify(["/keep/me", "/and/me", 42]), "utf-8");

			const response = await get("/toggle-pin?path=%2Fnew");

			expect(response.json()).toEqual({ status: "ok", pinned: true });
			expect(readJson(pinnedFile)).toEqual(["/keep/me", "/and/me", "/new"]);
		});

		it("allows cross-origin callers", async () => {
			const response = await get("/toggle-pin?path=%2Froot%2FX");

			expect(response.headers["access-control-allow-origin"]).toBe("*");
			expect(response.headers["content-type"]).toContain("application/json");
		});

		it("keeps every pin when requests overlap", async () => {
			await Promise.all(
				["/a", "/b", "/c"].map((path) =>
					get(`/toggle-pin?path=${encodeURIComponent(path)}`),
				),
			);

			const pinned = readJson(pinnedFile);
			expect(Array.isArray(pinned) ? [...pinned].sort() : pinned).toEqual([
				"/a",
				"/b",
				"/c",
			]);
		});
	});

	describe("GET /open-in-cursor", () => {
		it("rejects a path that does not exist and records nothing", async () => {
			const response = await get("/open-in-cursor?path=%2Fnonexistent");

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({
				status: "error",
				message: "Invalid path",
			});
			expect(open).not.toHaveBeenCalled();
			expect(existsSync(recentFile)).toBe(false);
		});

		it("rejects a missing path parameter", async () => {
			const response = await get("/open-in-cursor");

			expect(response.statusCode).toBe(400);
			expect(response.json()).toMatchObject({ status: "error" });
		});

		it("launches the editor and records the open", async () => {
			const response = await get(
				`/open-in-cursor?path=${encodeURIComponent(projectDir)}&new=false`,
			);

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({ status: "ok" });
			expect(open).toHaveBeenCalledWith(projectDir, { newWindow: false });

			const log = readJson(recentFile);
			expect(log).toEqual([
				{ path: projectDir, opened_at: expect.any(String) },
			]);
		});

		it("opens the first path when the parameter is repeated", async () => {
			const response = await get(
				`/open-in-cursor?path=${encodeURIComponent(projectDir)}&path=%2Fnonexistent`,
			);

			expect(response.statusCode).toBe(200);
			expect(open).toHaveBeenCalledWith(projectDir, { newWindow: false });
		});

		it("requests a new window when new=true", async () => {
			await get(`/open-in-cursor?path=${encodeURIComponent(projectDir)}&new=true`);

			expect(open).toHaveBeenCalledWith(projectDir, { newWindow: true });
		});
	});

	describe("GET /", () => {
		it("reports 404 before the dashboard has been generated", async () => {
			const response = await get("/");

			expect(response.statusCode).toBe(404);
			expect(response.json()).toEqual({
				status: "error",
				message: "Dashboard has not been generated yet",
			});
		});

		it("serves the last generated dashboard", async () => {
			writeFileSync(outputFile, "<!DOCTYPE html><p>dashboard</p>", "utf-8");

			const response = await get("/");

			expect(response.statusCode).toBe(200);
			expect(response.headers["content-type"]).toContain("text/html");
			expect(response.body).toBe("<!DOCTYPE html><p>dashboard</p>");
		});
	});

	describe("static files", () => {
		it("serves files from the dashboard directory", async () => {
			writeFileSync(join(dashboardDir, "notes.txt"), "hello", "utf-8");

			const response = await get("/notes.txt");

			expect(response.statusCode).toBe(200);
			expect(response.body).toBe("hello");
		});

		it("does not serve files outside the dashboard directory", async () => {
			writeFileSync(join(tempDir, "secret.txt"), "top secret", "utf-8");

			const response = await get("/%2e%2e/secret.txt");

			expect(response.statusCode).not.toBe(200);
			expect(response.body).not.toBe("top secret");
		});
	});
});

describe("Dashboard routes when a store write fails", () => {
	let app: FastifyInstance | null = null;
	let tempDir: string;
	let toggle: Mock<PinnedStore["toggle"]>;
	let record: Mock<RecentOpenLog["record"]>;
	let open: Mock<EditorLauncher["open"]>;

	beforeEach(async () => {
		tempDir = makeTempRoot();
		toggle = vi.fn<PinnedStore["toggle"]>();
		record = vi.fn<RecentOpenLog["record"]>();
		open = vi.fn<EditorLauncher["open"]>();

		app = await buildApp({
			config: {
				dashboardDir: tempDir,
				outputFile: join(tempDir, "dashboard.html"),
			},
			pinnedStore: { toggle },
			recentOpenLog: { record },
			launcher: { open },
			regenerate: vi.fn<() => Promise<unknown>>().mockResolvedValue(undefined),
		});
		await app.ready();
	});

	afterEach(async () => {
		if (app !== null) {
			await app.close();
			app = null;
		}
		rmSync(tempDir, { recursive: true, force: true });
	});

	it("answers a failed toggle with the JSON error shape", async () => {
		toggle.mockRejectedValue(new Error("EROFS: read-only file system"));
		if (app === null) throw new Error("app not built");

		const response = await app.inject({
			method: "GET",
			url: "/toggle-pin?path=%2Froot%2FX",
		});

		expect(response.statusCode).toBe(500);
		expect(response.json()).toEqual({
			status: "error",
			message: "Could not update pinned list: EROFS: read-only file system",
		});
		expect(response.headers["access-control-allow-origin"]).toBe("*");
	});

	it("acknowledges an open whose log entry could not be written", async () => {
		record.mockRejectedValue(new Error("EEXIST: file already exists"));
		if (app === null) throw new Error("app not built");

		const response = await app.inject({
			method: "GET",
			url: `/open-in-cursor?path=${encodeURIComponent(tempDir)}`,
		});

		expect(response.statusCode).toBe(200);
		expect(response.json()).toEqual({ status: "ok" });
		expect(open).toHaveBeenCalledWith(tempDir, { newWindow: false });
	});
});

