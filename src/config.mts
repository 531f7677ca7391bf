/**
 * YAML configuration with hot reload.
 *
 * The current configuration is a frozen snapshot. Reloading swaps in a new
 * snapshot as a whole, so a reader holding one never sees a half-applied
 * change.
 */

import fs from "node:fs/promises";
import { watch, type FSWatcher } from "chokidar";
import { parseDocument, type Document } from "yaml";
import { z } from "zod";

const config_schema = z.object({
	matrix: z.object({
		hostname: z.string().min(1),
		port: z.number().int().min(1).max(65535).default(443),
		protocol: z.enum(["https:", "http:"]).default("https:"),
		token: z.string().min(1),
	}),
	prefix: z.string().min(1).default("!"),
	command: z.array(z.string().min(1)).min(1).default(["altalias", "alias"]),
	admins: z.array(z.string()).default([]),
	require_lowercase: z.boolean().default(true),
	rooms: z.record(
		z.string(),
		z.object({ formats: z.array(z.string()).default([]) }),
	).default({}),
});

type Config = z.infer<typeof config_schema>;

type DeepReadonly<T> = T extends Array<infer U>
	? ReadonlyArray<DeepReadonly<U>>
	: T extends object
		? { readonly [K in keyof T]: DeepReadonly<T[K]> }
		: T;

type ConfigSnapshot = DeepReadonly<Config> & { readonly version: number };

type ReloadListener = (snapshot: ConfigSnapshot) => void;

class ConfigLoadError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigLoadError";
	}
}

function deep_freeze<T>(value: T): T {
	if (typeof value == "object" && value !== null && !Object.isFrozen(value)) {
		for (let child of Object.values(value)) deep_freeze(child);
		Object.freeze(value);
	}
	return value;
}

function parse_config(text: string, path: string): { document: Document; config: Config } {
	let document = parseDocument(text);
	if (document.errors.length > 0) {
		throw new ConfigLoadError(`Failed to parse ${path}: ${document.errors[0].message}`);
	}

	let parsed = config_schema.safeParse(document.toJS());
	if (!parsed.success) {
		let issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigLoadError(`Invalid config ${path}: ${issues}`);
	}

	return { document: document, config: parsed.data };
}

class ConfigStore {
	path: string;

	private current: ConfigSnapshot;
	private document: Document;
	private text: string;
	private listeners: Array<ReloadListener>;
	private watcher?: FSWatcher;
	private debounce?: NodeJS.Timeout;

	private constructor(path: string, text: string, document: Document, config: Config) {
		this.path = path;
		this.text = text;
		this.document = document;
		this.current = deep_freeze({ ...config, version: 1 });
		this.listeners = [];
	}

	static async read(path: string): Promise<string> {
		try {
			return await fs.readFile(path, "utf8");
		} catch (err) {
			throw new ConfigLoadError(`Failed to read ${path}`, { cause: err });
		}
	}

	static async load(path: string): Promise<ConfigStore> {
		let text = await ConfigStore.read(path);
		let { document, config } = parse_config(text, path);
		console.log(`Loaded config from ${path}`);
		return new ConfigStore(path, text, document, config);
	}

	get snapshot(): ConfigSnapshot {
		return this.current;
	}

	on_reload(listener: ReloadListener) {
		this.listeners.push(listener);
	}

	/* Throws ConfigLoadError and keeps the current snapshot on a bad file */
	async reload(): Promise<ConfigSnapshot> {
		let text = await ConfigStore.read(this.path);
		if (text === this.text) return this.current;

		let { document, config } = parse_config(text, this.path);
		this.text = text;
		this.document = document;
		this.current = deep_freeze({ ...config, version: this.current.version + 1 });
		console.log(`Reloaded config from ${this.path} (version ${this.current.version})`);

		for (let listener of this.listeners) {
			listener(this.current);
		}
		return this.current;
	}

	/*
	 * Only the rooms key is rewritten, the rest of the file is left alone.
	 * Refuses to write over edits that have not been reloaded yet.
	 */
	async save_rooms(rooms: Record<string, { formats: Array<string> }>) {
		let on_disk = await ConfigStore.read(this.path);
		if (on_disk !== this.text) {
			throw new ConfigLoadError(`${this.path} changed since it was last loaded, not saving`);
		}

		this.document.set("rooms", this.document.createNode(rooms));
		let text = this.document.toString();
		await fs.writeFile(this.path, text, "utf8");

		this.text = text;
		let config = config_schema.parse(this.document.toJS());
		this.current = deep_freeze({ ...config, version: this.current.version + 1 });
	}

	watch(debounce_ms = 300) {
		if (this.watcher) return;

		this.watcher = watch(this.path, {
			ignoreInitial: true,
			persistent: true,
			awaitWriteFinish: {
				stabilityThreshold: 100,
				pollInterval: 50,
			},
		});

		this.watcher
			.on("change", () => {
				clearTimeout(this.debounce);
				this.debounce = setTimeout(() => {
					this.reload().catch((err: unknown) => {
						console.error("Config reload failed, keeping previous config:", err);
					});
				}, debounce_ms);
			})
			.on("error", (err: unknown) => {
				console.error("Config watcher error:", err);
			});
	}

	async close() {
		clearTimeout(this.debounce);
		if (this.watcher) {
			await this.watcher.close();
			this.watcher = undefined;
		}
	}
}

export { ConfigStore, ConfigLoadError, config_schema, parse_config };
export type { Config, ConfigSnapshot, ReloadListener };
