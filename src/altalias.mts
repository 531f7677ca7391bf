import {
	AliasSyntaxError,
	get_localpart,
	is_lowercase,
	localpart_matches,
	parse_alias,
	type ParsedAlias,
} from "./alias.mjs";
import { Command, type CommandContext } from "./command.mjs";
import type { ConfigStore } from "./config.mjs";
import { MatrixError, type MatrixAPI } from "./matrix-api.mjs";
import { deadline_ms, match_any } from "./regex-guard.mjs";
import { FormatError, RoomRules } from "./rules.mjs";
import {
	canonical_alias_content,
	power_levels_content,
	type CanonicalAliasContent,
	type PowerLevelsContent,
} from "./schema.mjs";
import { Util } from "./utils.mjs";

const CANONICAL_ALIAS = "m.room.canonical_alias";
const POWER_LEVELS = "m.room.power_levels";

type AliasAPI = Pick<MatrixAPI, "v3_directory" | "v3_state" | "v3_put_state">;
type RulesStore = Pick<ConfigStore, "snapshot" | "on_reload" | "reload" | "save_rooms">;

interface AltAliasOptions {
	/* Length of one deadline unit for regex evaluation, one second by default */
	unit_ms?: number;
}

function user_level(levels: PowerLevelsContent, user_id: UserID): number {
	return levels.users?.[user_id] ?? levels.users_default ?? 0;
}

function event_level(levels: PowerLevelsContent, type: string): number {
	return levels.events?.[type] ?? levels.state_default ?? 50;
}

class AltAliasBot {
	api: AliasAPI;
	store: RulesStore;
	rules: RoomRules;
	unit_ms: number;

	constructor(api: AliasAPI, store: RulesStore, options: AltAliasOptions = {}) {
		this.api = api;
		this.store = store;
		this.unit_ms = options.unit_ms ?? 1000;
		this.rules = RoomRules.from_config(store.snapshot.rooms);

		store.on_reload((snapshot) => {
			this.rules = RoomRules.from_config(snapshot.rooms);
			console.log(`Loaded alias rules for ${this.rules.size} rooms`);
		});
	}

	command(): Command {
		return new Command("altalias")
			.set_names((config) => config.command)
			.set_description("Manage alternate aliases")
			.subcommand(
				new Command("publish <alias>", this.publish.bind(this))
					.set_aliases("add")
					.set_description("Publish an alias from your server in the alternate aliases of this room."),
			)
			.subcommand(
				new Command("allow <regex>", this.allow.bind(this))
					.set_description("Add a regex for matching allowed alternate aliases"),
			)
			.subcommand(
				new Command("allowed", this.allowed.bind(this))
					.set_description("View allowed alternate alias formats"),
			);
	}

	async publish(ctx: CommandContext) {
		let alias = await this.validate_alias(ctx, ctx.pill() ?? ctx.raw());
		if (!alias) return;

		let existing = await this.get_existing_aliases(ctx);
		if (!existing) return;

		if ((existing.alt_aliases ?? []).includes(alias)) {
			await ctx.reply("That alias is already published in this room");
			return;
		}

		if (!(await this.is_allowed(ctx.event.room_id, alias, existing))) {
			await ctx.reply("That alias is not allowed in this room");
			return;
		}

		await this.publish_alias(ctx, alias, existing);
	}

	async validate_alias(ctx: CommandContext, text: string): Promise<RoomAlias | null> {
		let parsed: ParsedAlias;
		try {
			parsed = parse_alias(text);
		} catch (err) {
			if (!(err instanceof AliasSyntaxError)) throw err;
			await ctx.reply(`That is not a valid room alias: ${Util.escape_html(err.message)}`);
			return null;
		}

		if (ctx.config.require_lowercase && !is_lowercase(parsed.localpart)) {
			await ctx.reply("That alias localpart is not in lowercase");
			return null;
		}

		let info: { room_id: RoomID };
		try {
			info = await this.api.v3_directory(parsed.alias);
		} catch (err) {
			if (err instanceof MatrixError && err.is_not_found()) {
				await ctx.reply("That alias does not exist");
			} else {
				console.warn(`Failed to resolve ${parsed.alias}:`, err);
				await ctx.reply("Failed to get alias info");
			}
			return null;
		}

		if (info.room_id != ctx.event.room_id) {
			await ctx.reply("That alias does not point to this room");
			return null;
		}

		return parsed.alias;
	}

	async get_existing_aliases(ctx: CommandContext): Promise<CanonicalAliasContent | null> {
		let room_id = ctx.event.room_id;
		try {
			return await this.api.v3_state(room_id, CANONICAL_ALIAS, canonical_alias_content);
		} catch (err) {
			if (err instanceof MatrixError) {
				if (err.is_not_found()) return {};
				await ctx.reply(`Failed to get current aliases: ${Util.escape_html(err.message)}`);
				return null;
			}
			console.error(`Failed to get ${CANONICAL_ALIAS} in ${room_id}:`, err);
			await ctx.reply("Failed to get current aliases (see logs for more details)");
			return null;
		}
	}

	/*
	 * Without rules only aliases sharing a localpart with one the room
	 * already has are accepted. With rules the alias has to fully match one
	 * of them. An evaluation that runs out of time is a denial.
	 */
	async is_allowed(room_id: RoomID, alias: RoomAlias, existing: CanonicalAliasContent): Promise<boolean> {
		let formats = this.rules.get(room_id);

		if (!formats) {
			let localpart = get_localpart(alias);
			if (localpart_matches(existing.alias, localpart)) return true;
			for (let existing_alias of existing.alt_aliases ?? []) {
				if (localpart_matches(existing_alias, localpart)) return true;
			}
			return false;
		}

		return await match_any(
			formats.map((format) => format.regex.source),
			alias,
			{ timeout_ms: deadline_ms(formats.length, this.unit_ms) },
		);
	}

	async publish_alias(ctx: CommandContext, alias: RoomAlias, existing: CanonicalAliasContent) {
		let room_id = ctx.event.room_id;
		let content = {
			...existing,
			alt_aliases: [...(existing.alt_aliases ?? []), alias],
		};

		try {
			await this.api.v3_put_state(room_id, CANONICAL_ALIAS, content);
		} catch (err) {
			if (err instanceof MatrixError) {
				if (err.is_forbidden()) {
					await ctx.reply("I don't have the permission to publish aliases :(");
				} else {
					await ctx.reply(`Failed to publish alias: ${Util.escape_html(err.message)}`);
				}
				return;
			}
			console.error(`Failed to publish alias ${alias}:`, err);
			await ctx.reply("Failed to publish alias (see logs for more details)");
			return;
		}

		console.log(`Published ${alias} in ${room_id} for ${ctx.event.sender}`);
		await ctx.react("✅");
	}

	async can_manage(ctx: CommandContext): Promise<boolean> {
		let sender = ctx.event.sender;
		if (ctx.config.admins.includes(sender)) return true;

		let levels = await this.api.v3_state(ctx.event.room_id, POWER_LEVELS, power_levels_content);
		return user_level(levels, sender) >= event_level(levels, CANONICAL_ALIAS);
	}

	async allow(ctx: CommandContext) {
		if (!(await this.can_manage(ctx))) {
			await ctx.reply("You don't have the permission to manage aliases in this room");
			return;
		}

		let room_id = ctx.event.room_id;
		let pattern = ctx.raw();

		/* Picks up edits made to the file since the last reload, so saving keeps them */
		await this.store.reload();

		let rules: RoomRules;
		try {
			rules = this.rules.with_format(room_id, pattern);
		} catch (err) {
			if (!(err instanceof FormatError)) throw err;
			await ctx.reply(`That is not a valid regular expression: <code>${Util.escape_html(err.message)}</code>`);
			return;
		}

		this.rules = rules;
		await this.store.save_rooms(rules.to_config());
		console.log(`Added alias format ${pattern} in ${room_id}`);

		await ctx.reply(`Added <code>${Util.escape_html(pattern)}</code> as an allowed alias format`);
	}

	async allowed(ctx: CommandContext) {
		let formats = this.rules.get(ctx.event.room_id);
		if (!formats) {
			await ctx.reply(
				"This room does not have special alias rules. Aliases with the same " +
				"localpart as any of the existing aliases can be published.",
			);
			return;
		}

		let allowed = formats
			.map((format) => `<li><code>${Util.escape_html(format.pattern)}</code></li>`)
			.join("");
		await ctx.reply(
			"<p>This room allows aliases matching the following regular expressions:</p>" +
			`<ul>${allowed}</ul>`,
		);
	}
}

export { AltAliasBot, user_level, event_level };
export type { AliasAPI, AltAliasOptions, RulesStore };
