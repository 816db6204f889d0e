import { describe, expect, it } from "vitest";
import { join } from "node:path";
import {
	DEFAULT_CATEGORIES,
	DEFAULT_PORT,
	defaultEditorStoragePath,
	loadConfig,
} from "../../server/config";

const HOME = "/home/tester";

describe("loadConfig", () => {
	it("falls back to defaults for an empty environment", () => {
		const config = loadConfig({}, HOME);

		expect(config.root).toBe(join(HOME, "Coding"));
		expect(config.categories).toEqual(DEFAULT_CATEGORIES);
		expect(config.ignore.has("node_modules")).toBe(true);
		expect(config.ignore.has(".DS_Store")).toBe(true);
		expect(config.port).toBe(DEFAULT_PORT);
		expect(config.host).toBe("127.0.0.1");
		expect(config.editorCommand).toBe("cursor");
		expect(config.maxRecent).toBe(10);
		expect(config.maxRecentOpens).toBe(20);
		expect(config.descriptorFile).toBe("catalogue.json");
		expect(config.screenshotFile).toBe("screenshot.png");
		expect(config.dashboardDir).toBe(join(HOME, ".launchpad"));
		expect(config.pinnedFile).toBe(join(HOME, ".launchpad", "pinned.json"));
		expect(config.recentOpenFile).toBe(join(HOME, ".launchpad", "recent.json"));
		expect(config.outputFile).toBe(join(HOME, ".launchpad", "dashboard.html"));
	});

	it("reads overrides from the environment", () => {
		const config = loadConfig(
			{
				LAUNCHPAD_ROOT: "/srv/code/",
				LAUNCHPAD_CATEGORIES: " APPS , LIBS,,APPS",
				LAUNCHPAD_IGNORE: "target",
				LAUNCHPAD_DASHBOARD_DIR: "/tmp/launchpad",
				PORT: "9001",
				LAUNCHPAD_EDITOR: "code",
				LAUNCHPAD_EDITOR_STORAGE: "/tmp/storage.json",
				LAUNCHPAD_MAX_RECENT: "4",
			},
			HOME,
		);

		expect(config.root).toBe("/srv/code");
		expect(config.categories).toEqual(["APPS", "LIBS"]);
		expect([...config.ignore]).toEqual(["target"]);
		expect(config.port).toBe(9001);
		expect(config.editorCommand).toBe("code");
		expect(config.editorStoragePath).toBe("/tmp/storage.json");
		expect(config.maxRecent).toBe(4);
		expect(config.outputFile).toBe("/tmp/launchpad/dashboard.html");
	});

	it("rejects a non-numeric port", () => {
		let caught: unknown;
		try {
			loadConfig({ PORT: "abc" }, HOME);
		} catch (err: unknown) {
			caught = err;
		}

		expect(caught).toMatchObject({ name: "AppError", code: "INVALID_CONFIG" });
	});

	it("rejects a relative root", () => {
		expect(() => loadConfig({ LAUNCHPAD_ROOT: "code" }, HOME)).toThrow(
			/root: must be an absolute path/,
		);
	});
});

describe("defaultEditorStoragePath", () => {
	it("resolves per platform", () => {
		expect(defaultEditorStoragePath("darwin", {}, HOME)).toBe(
			join(
				HOME,
				"Library",
				"Application Support",
				"Cursor",
				"User",
				"globalStorage",
				"storage.json",
			),
		);
		expect(defaultEditorStoragePath("linux", {}, HOME)).toBe(
			join(HOME, ".config", "Cursor", "User", "globalStorage", "storage.json"),
		);
		expect(
			defaultEditorStoragePath("linux", { XDG_CONFIG_HOME: "/xdg" }, HOME),
		).toBe(join("/xdg", "Cursor", "User", "globalStorage", "storage.json"));
	});
});
