import fs from "node:fs/promises";
import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigLoadError, ConfigStore, parse_config } from "./config.mjs";
import { temp_config } from "./test-utils.mjs";

describe("parse_config", () => {
	it("fills in defaults", () => {
		let { config } = parse_config("matrix:\n  hostname: matrix.example.org\n  token: test-token\n", "test.yaml");

		expect(config).toEqual({
			matrix: {
				hostname: "matrix.example.org",
				port: 443,
				protocol: "https:",
				token: "test-token",
			},
			prefix: "!",
			command: ["altalias", "alias"],
			admins: [],
			require_lowercase: true,
			rooms: {},
		});
	});

	it("names the invalid keys", () => {
		expect(() => parse_config("matrix:\n  hostname: matrix.example.org\n", "test.yaml"))
			.toThrow(/Invalid config test\.yaml: matrix\.token: Required/);
		expect(() => parse_config("matrix:\n  hostname: h\n  token: t\ncommand: []\n", "test.yaml"))
			.toThrow(/command:/);
	});

	it("rejects broken YAML", () => {
		expect(() => parse_config("matrix: [unclosed\n", "test.yaml")).toThrow(ConfigLoadError);
		expect(() => parse_config("matrix: [unclosed\n", "test.yaml")).toThrow(/Failed to parse test\.yaml/);
	});
});

describe("ConfigStore", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("loads a frozen first snapshot", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store } = await temp_config("require_lowercase: false\n");

		expect(store.snapshot.version).toBe(1);
		expect(store.snapshot.require_lowercase).toBe(false);
		expect(Object.isFrozen(store.snapshot)).toBe(true);
		expect(Object.isFrozen(store.snapshot.command)).toBe(true);
		expect(Object.isFrozen(store.snapshot.matrix)).toBe(true);
	});

	it("fails to load a missing file", async () => {
		await expect(ConfigStore.load("/nonexistent/altalias/config.yaml")).rejects.toThrow(ConfigLoadError);
	});

	it("swaps in a new snapshot on reload and notifies listeners", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store, path } = await temp_config();
		let before = store.snapshot;
		let seen: Array<number> = [];
		store.on_reload((snapshot) => seen.push(snapshot.version));

		await fs.writeFile(path, "matrix:\n  hostname: h\n  token: t\nadmins: ['@admin:example.org']\n");
		let after = await store.reload();

		expect(after.version).toBe(2);
		expect(after.admins).toEqual(["@admin:example.org"]);
		expect(store.snapshot).toBe(after);
		expect(before.version).toBe(1);
		expect(before.admins).toEqual([]);
		expect(seen).toEqual([2]);
	});

	it("ignores a reload when the file did not change", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store } = await temp_config();
		let listener = vi.fn();
		store.on_reload(listener);

		let same = await store.reload();

		expect(same).toBe(store.snapshot);
		expect(same.version).toBe(1);
		expect(listener).not.toHaveBeenCalled();
	});

	it("keeps the previous snapshot when the new file is invalid", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store, path } = await temp_config();
		let before = store.snapshot;

		await fs.writeFile(path, "matrix:\n  hostname: h\nrequire_lowercase: maybe\n");

		await expect(store.reload()).rejects.toThrow(ConfigLoadError);
		expect(store.snapshot).toBe(before);
	});

	it("saves rooms without touching the rest of the file", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store, path } = await temp_config("# keep this comment\nprefix: \"?\"\n");

		await store.save_rooms({ "!room:example.org": { formats: ["#team-.*:example\\.org"] } });

		let text = await fs.readFile(path, "utf8");
		expect(text).toContain("# keep this comment");
		expect(text).toContain("token: test-token");
		expect(store.snapshot.version).toBe(2);
		expect(store.snapshot.prefix).toBe("?");
		expect(store.snapshot.rooms["!room:example.org"].formats).toEqual(["#team-.*:example\\.org"]);

		let reloaded = await ConfigStore.load(path);
		expect(reloaded.snapshot.rooms).toEqual({
			"!room:example.org": { formats: ["#team-.*:example\\.org"] },
		});

		/* Our own write is not picked up as an external change */
		await store.reload();
		expect(store.snapshot.version).toBe(2);
	});

	it("refuses to save over edits that were not reloaded", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		let { store, path } = await temp_config();
		let edited = "matrix:\n  hostname: matrix.example.org\n  token: test-token\nprefix: \"?\"\n";
		await fs.writeFile(path, edited);

		await expect(store.save_rooms({ "!room:example.org": { formats: ["#a:x"] } }))
			.rejects.toThrow(ConfigLoadError);

		expect(await fs.readFile(path, "utf8")).toBe(edited);
		expect(store.snapshot.version).toBe(1);
	});
});
