import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { z } from "zod";

import type { AliasAPI } from "./altalias.mjs";
import type { CommandEvent, Responder } from "./command.mjs";
import { ConfigStore, config_schema, type ConfigSnapshot } from "./config.mjs";
import { MatrixError } from "./matrix-api.mjs";

const base_config = `matrix:
  hostname: matrix.example.org
  token: test-token
`;

async function temp_config(extra = "") {
	let dir = await fs.mkdtemp(path.join(os.tmpdir(), "altalias-"));
	let file = path.join(dir, "config.yaml");
	await fs.writeFile(file, base_config + extra, "utf8");
	return { store: await ConfigStore.load(file), path: file, dir: dir };
}

function snapshot(overrides: Record<string, unknown> = {}): ConfigSnapshot {
	let config = config_schema.parse({
		matrix: { hostname: "matrix.example.org", token: "test-token" },
		...overrides,
	});
	return { ...config, version: 1 };
}

function command_event(body: string, overrides: Partial<CommandEvent> = {}): CommandEvent {
	return {
		room_id: "!room:example.org",
		event_id: "$command",
		sender: "@alice:example.org",
		body: body,
		...overrides,
	};
}

class FakeResponder implements Responder {
	replies: Array<string> = [];
	reactions: Array<string> = [];

	async reply(event: CommandEvent, html: string) {
		this.replies.push(html);
	}

	async react(event: CommandEvent, key: string) {
		this.reactions.push(key);
	}
}

/* In-memory room directory and room state */
class FakeMatrix implements AliasAPI {
	directory = new Map<string, RoomID>();
	state = new Map<string, object>();
	puts: Array<{ room_id: RoomID; type: string; content: object }> = [];
	fail: {
		directory?: Error;
		state?: Error;
		put?: Error;
	} = {};

	set_state(room_id: RoomID, type: string, content: object) {
		this.state.set(`${room_id}/${type}`, content);
	}

	async v3_directory(alias: RoomAlias) {
		if (this.fail.directory) throw this.fail.directory;
		let room_id = this.directory.get(alias);
		if (!room_id) throw new MatrixError(404, "M_NOT_FOUND", `Room alias ${alias} not found.`);
		return { room_id: room_id };
	}

	async v3_state<T extends z.ZodTypeAny>(room_id: RoomID, type: string, shape: T): Promise<z.output<T>> {
		if (this.fail.state) throw this.fail.state;
		let content = this.state.get(`${room_id}/${type}`);
		if (!content) throw new MatrixError(404, "M_NOT_FOUND", "Event not found.");
		return shape.parse(content);
	}

	async v3_put_state(room_id: RoomID, type: string, content: object) {
		if (this.fail.put) throw this.fail.put;
		this.puts.push({ room_id: room_id, type: type, content: content });
		this.set_state(room_id, type, content);
		return `$state${this.puts.length}`;
	}
}

export { temp_config, snapshot, command_event, FakeResponder, FakeMatrix };
