import { parse } from "node-html-parser";

import { CommandManager, type CommandEvent, type Responder } from "./command.mjs";
import type { ConfigStore } from "./config.mjs";
import { MatrixAPI } from "./matrix-api.mjs";
import { message_content, room_event, type RoomEvent, type SyncResponse } from "./schema.mjs";
import { Util } from "./utils.mjs";

/* Plain text version of a reply, for clients that ignore formatted_body */
function html_to_text(html: string): string {
	let spaced = html.replace(/<\/(p|li)>|<br\s*\/?>/g, "$&\n");
	return parse(spaced).textContent.trim();
}

/* "> quoted\n\n!command" keeps only the part after the reply fallback */
function strip_reply_fallback(body: string): string {
	if (body[0] == ">" && body.search("\n\n") != -1) {
		let stripped = body.split("\n\n").slice(1).join("\n\n");
		if (stripped) return stripped;
	}
	return body;
}

class Bot implements Responder {
	store: ConfigStore;
	api: MatrixAPI;
	cmd: CommandManager;
	user_id: UserID | null;
	exit: boolean;
	var: {
		unsynced: boolean;
	};

	constructor(store: ConfigStore, api?: MatrixAPI) {
		this.store = store;
		this.api = api ?? new MatrixAPI(store.snapshot.matrix);
		this.cmd = new CommandManager(this, () => this.store.snapshot);
		this.user_id = null;
		this.exit = false;
		this.var = {
			unsynced: true,
		};
	}

	async init() {
		this.user_id = await this.api.v3_whoami();
		console.log(`Logged in as ${this.user_id}`);
	}

	async sync() {
		console.log("Begin sync loop");
		while (!this.exit) {
			let sync = await this.api.v3_sync();
			if (sync) await this.sync_tick(sync);
		}
	}

	async sync_tick(sync: SyncResponse) {
		if (!sync.rooms) {
			this.var.unsynced = false;
			return;
		}

		for (let room_id in sync.rooms.invite) {
			if (!Util.is_room_id(room_id)) continue;
			console.log(`Invited to ${room_id}, joining`);
			try {
				await this.api.v3_join(room_id);
			} catch (err) {
				console.error(`Failed to join ${room_id}:`, err);
			}
		}

		for (let [room_id, room] of Object.entries(sync.rooms.join)) {
			if (!Util.is_room_id(room_id)) continue;

			/* The first sync is backlog, commands in it were meant for someone else */
			if (this.var.unsynced) continue;

			for (let raw of room.timeline?.events ?? []) {
				let e = room_event.safeParse(raw);
				if (!e.success) continue;
				await this.event(room_id, e.data);
			}
		}

		if (this.var.unsynced) console.log("!!! LIVE !!!");
		this.var.unsynced = false;
	}

	/* Main event handler */
	async event(room_id: RoomID, e: RoomEvent) {
		if (e.type != "m.room.message") return;
		if (e.sender == this.user_id) return;

		let content = message_content.safeParse(e.content);
		if (!content.success || content.data.msgtype != "m.text") return;

		let event: CommandEvent = {
			room_id: room_id,
			event_id: e.event_id,
			sender: e.sender,
			body: strip_reply_fallback(content.data.body),
			formatted_body: content.data.format == "org.matrix.custom.html"
				? content.data.formatted_body
				: undefined,
		};

		if (!event.body.startsWith(this.store.snapshot.prefix)) return;

		console.log(`Running command ${event.body} from ${e.sender} in ${room_id}`);
		await this.cmd.run(event);
	}

	async reply(event: CommandEvent, html: string) {
		let content = {
			msgtype: "m.notice",
			body: html_to_text(html),
			format: "org.matrix.custom.html",
			formatted_body: html,
			"m.relates_to": {
				"m.in_reply_to": {
					event_id: event.event_id,
				},
			},
		};

		await this.api.v3_send(event.room_id, "m.room.message", content);
	}

	async react(event: CommandEvent, key: string) {
		let content = {
			"m.relates_to": {
				event_id: event.event_id,
				key: key,
				rel_type: "m.annotation",
			},
		};

		await this.api.v3_send(event.room_id, "m.reaction", content);
	}
}

export { Bot, html_to_text, strip_reply_fallback };
