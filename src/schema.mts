import { z } from "zod";

import { Util } from "./utils.mjs";

/*
 * Shapes of the client-server API payloads the bot reads. Unknown keys in
 * state content are kept, since state events are written back whole.
 */

const user_id = z.custom<UserID>((v) => typeof v === "string" && Util.is_user_id(v), "Invalid user id");
const room_id = z.custom<RoomID>((v) => typeof v === "string" && Util.is_room_id(v), "Invalid room id");

const error_body = z.object({
	errcode: z.string(),
	error: z.string().optional(),
	retry_after_ms: z.number().optional(),
});

const directory_response = z.object({
	room_id: room_id,
	servers: z.array(z.string()).optional(),
});

const whoami_response = z.object({
	user_id: user_id,
});

const event_id_response = z.object({
	event_id: z.string(),
});

const join_response = z.object({
	room_id: room_id,
});

const canonical_alias_content = z.object({
	alias: z.string().nullish(),
	alt_aliases: z.array(z.string()).optional(),
}).passthrough();

const power_levels_content = z.object({
	users: z.record(z.number()).optional(),
	users_default: z.number().optional(),
	events: z.record(z.number()).optional(),
	state_default: z.number().optional(),
}).passthrough();

const message_content = z.object({
	msgtype: z.string(),
	body: z.string(),
	format: z.string().optional(),
	formatted_body: z.string().optional(),
});

const room_event = z.object({
	type: z.string(),
	event_id: z.string(),
	sender: user_id,
	content: z.record(z.unknown()),
	origin_server_ts: z.number().optional(),
});

const sync_response = z.object({
	next_batch: z.string(),
	rooms: z.object({
		join: z.record(z.object({
			timeline: z.object({
				events: z.array(z.unknown()).default([]),
				limited: z.boolean().optional(),
			}).optional(),
		})).default({}),
		invite: z.record(z.unknown()).default({}),
	}).optional(),
});

type CanonicalAliasContent = z.infer<typeof canonical_alias_content>;
type PowerLevelsContent = z.infer<typeof power_levels_content>;
type RoomEvent = z.infer<typeof room_event>;
type SyncResponse = z.infer<typeof sync_response>;

export {
	error_body,
	directory_response,
	whoami_response,
	event_id_response,
	join_response,
	canonical_alias_content,
	power_levels_content,
	message_content,
	room_event,
	sync_response,
};
export type { CanonicalAliasContent, PowerLevelsContent, RoomEvent, SyncResponse };
