import { parse } from "node-html-parser";

import type { ConfigSnapshot } from "./config.mjs";
import { is_room_alias } from "./alias.mjs";
import { parse_command, type Word } from "./parse_command.mjs";
import { Util } from "./utils.mjs";

const doc_col_1 = 32;

interface CommandEvent {
	room_id: RoomID;
	event_id: string;
	sender: UserID;
	/* Plain text body, reply fallback already stripped */
	body: string;
	formatted_body?: string;
}

interface Responder {
	reply(event: CommandEvent, html: string): Promise<void>;
	react(event: CommandEvent, key: string): Promise<void>;
}

type CommandHandler = (ctx: CommandContext) => Promise<void>;

interface Pill {
	id: RoomAlias;
	/* Word position of the pill in the message, after the reply quote is removed */
	index: number;
}

class Command {
	name: string;
	usage: string;
	fn: CommandHandler | null;
	description: string;
	aliases: Array<string>;
	sub: Array<Command>;
	names: (config: ConfigSnapshot) => ReadonlyArray<string>;

	constructor(usage: string, fn: CommandHandler | null = null) {
		this.usage = usage;
		this.name = usage.split(" ")[0];
		this.fn = fn;
		this.description = "";
		this.aliases = [];
		this.sub = [];
		this.names = () => [this.name, ...this.aliases];
	}

	set_description(text: string) {
		this.description = text;
		return this;
	}

	set_aliases(...aliases: Array<string>) {
		this.aliases = aliases;
		return this;
	}

	/* Names looked up from the live config on every dispatch */
	set_names(fn: (config: ConfigSnapshot) => ReadonlyArray<string>) {
		this.names = fn;
		return this;
	}

	subcommand(cmd: Command) {
		this.sub.push(cmd);
		return this;
	}

	matches(word: string, config: ConfigSnapshot) {
		return this.names(config).includes(word);
	}

	find(word: string, config: ConfigSnapshot) {
		return this.sub.find((cmd) => cmd.matches(word, config));
	}

	requires_argument() {
		return /<[^>]+>/.test(this.usage);
	}

	get arg_usage() {
		return this.usage.split(" ").slice(1).join(" ");
	}

	help(invoked: string) {
		let body = `${this.description}\n\n`;
		for (let cmd of this.sub) {
			let usage = `${invoked} ${cmd.usage}`;
			body += `${usage.padEnd(doc_col_1)} ${cmd.description}\n`;
		}
		return `<pre><code>${Util.escape_html(body.trimEnd())}</code></pre>`;
	}

	register(manager: CommandManager) {
		manager.register(this);
		console.log(`Registered command ${this.name}`);
	}
}

class CommandContext {
	responder: Responder;
	event: CommandEvent;
	config: ConfigSnapshot;
	words: Array<Word>;
	argv: Array<string>;
	/* Index of the first argument after the command path */
	depth: number;
	target: {
		room: Array<Pill>;
	};

	constructor(responder: Responder, event: CommandEvent, config: ConfigSnapshot) {
		this.responder = responder;
		this.event = event;
		this.config = config;
		this.depth = 1;
		this.target = {
			room: [],
		};

		this.words = parse_command(event.body);
		this.argv = this.words.map((word) => word.text);
		if (this.argv.length > 0) {
			this.argv[0] = this.argv[0].slice(config.prefix.length);
		}

		this.parse_links();
	}

	/* Room pills: <a href="https://matrix.to/#/#room:example.org">...</a> */
	parse_links() {
		if (!this.event.formatted_body) return;

		const root = parse(this.event.formatted_body);
		for (let quote of root.querySelectorAll("mx-reply")) {
			quote.remove();
		}

		/* Each pill becomes one marker word, so its position lines up with argv */
		let markers = new Map<string, RoomAlias>();
		for (let a of root.querySelectorAll("a")) {
			let url = a.getAttribute("href");
			if (!url) continue;

			let id = decode_link(url);
			if (!id || !is_room_alias(id)) continue;

			let marker = `\u0001pill${markers.size}\u0001`;
			markers.set(marker, id);
			a.replaceWith(` ${marker} `);
		}

		for (let [index, word] of parse_command(root.textContent).entries()) {
			let id = markers.get(word.text);
			if (id) this.target.room.push({ id: id, index: index });
		}
	}

	/* Room alias pill written in place of argument `index` */
	pill(index = this.depth): RoomAlias | null {
		return this.target.room.find((pill) => pill.index == index)?.id ?? null;
	}

	get args() {
		return this.argv.slice(this.depth);
	}

	/* Untouched text from word `index` to the end of the message */
	raw(index = this.depth) {
		let word = this.words[index];
		if (!word) return "";
		return this.event.body.slice(word.start).trim();
	}

	get invoked() {
		return `${this.config.prefix}${this.argv.slice(0, this.depth).join(" ")}`;
	}

	async reply(html: string) {
		await this.responder.reply(this.event, html);
	}

	async react(key: string) {
		await this.responder.react(this.event, key);
	}
}

function decode_link(url: string): string | null {
	let id = url.split("/").pop()?.split("?")[0];
	if (!id) return null;
	try {
		return decodeURIComponent(id);
	} catch (err) {
		return null;
	}
}

class CommandManager {
	responder: Responder;
	config: () => ConfigSnapshot;
	cmd: Array<Command>;

	md: string;

	constructor(responder: Responder, config: () => ConfigSnapshot) {
		this.responder = responder;
		this.config = config;
		this.cmd = [];
		this.md = "";

		this.md += `${"Command".padEnd(doc_col_1)} ${"Description"}\n`;
	}

	register(cmd: Command) {
		this.cmd.push(cmd);

		this.md += `${cmd.usage.padEnd(doc_col_1)} ${cmd.description}\n`;
		for (let sub of cmd.sub) {
			this.md += `${`${cmd.name} ${sub.usage}`.padEnd(doc_col_1)} ${sub.description}\n`;
		}
	}

	resolve(word: string, config: ConfigSnapshot) {
		return this.cmd.find((cmd) => cmd.matches(word, config));
	}

	/* Returns false if the message was not a command */
	async run(event: CommandEvent): Promise<boolean> {
		let config = this.config();
		if (!event.body.startsWith(config.prefix)) return false;

		let ctx = new CommandContext(this.responder, event, config);
		let cmd = this.resolve(ctx.argv[0], config);

		if (!cmd) {
			console.log(`No such command: ${ctx.argv[0]}`);
			return false;
		}

		while (ctx.depth < ctx.argv.length) {
			let sub: Command | undefined = cmd.find(ctx.argv[ctx.depth], config);
			if (!sub) break;
			cmd = sub;
			ctx.depth++;
		}

		try {
			if (!cmd.fn) {
				await ctx.reply(cmd.help(ctx.invoked));
			} else if (cmd.requires_argument() && ctx.raw() == "") {
				await ctx.reply(`Usage: <code>${Util.escape_html(`${ctx.invoked} ${cmd.arg_usage}`)}</code>`);
			} else {
				await cmd.fn(ctx);
			}
		} catch (err) {
			console.error(`Command ${ctx.invoked} in ${event.room_id} failed:`, err);
			try {
				await ctx.reply("An error occurred (see logs for more details)");
			} catch (reply_err) {
				console.error(`Could not report the failure in ${event.room_id}:`, reply_err);
			}
		}
		return true;
	}
}

export { Command, CommandContext, CommandManager };
export type { CommandEvent, CommandHandler, Pill, Responder };
