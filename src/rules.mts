/*
 * Per-room alias formats.
 *
 * A RoomRules object is never changed after construction. Adding a format
 * produces a new snapshot, and a configuration reload builds a whole new one
 * from the stored pattern strings.
 */

interface Format {
	readonly pattern: string;
	/* Anchored copy of pattern, matches the whole alias or nothing */
	readonly regex: RegExp;
}

interface RoomsConfig {
	readonly [room_id: string]: { readonly formats: ReadonlyArray<string> };
}

/*
 * strict:  a bad pattern throws FormatError (admin input, reported back)
 * lenient: a bad pattern is logged and skipped (stored config, never fatal)
 */
type CompileMode = "strict" | "lenient";

class FormatError extends Error {
	pattern: string;

	constructor(pattern: string, message: string) {
		super(message);
		this.name = "FormatError";
		this.pattern = pattern;
	}
}

function compile_format(pattern: string): Format {
	try {
		/* Checked on its own first, "a)(b" only compiles once wrapped */
		new RegExp(pattern);
		return {
			pattern: pattern,
			regex: new RegExp(`^(?:${pattern})$`),
		};
	} catch (err) {
		let message = err instanceof Error ? err.message : String(err);
		throw new FormatError(pattern, message);
	}
}

function compile_formats(room_id: string, patterns: ReadonlyArray<string>, mode: CompileMode): Array<Format> {
	let formats: Array<Format> = [];
	for (let pattern of patterns) {
		try {
			formats.push(compile_format(pattern));
		} catch (err) {
			if (mode == "strict" || !(err instanceof FormatError)) throw err;
			console.warn(`Failed to compile pattern ${pattern} in room ${room_id}: ${err.message}`);
		}
	}
	return formats;
}

class RoomRules {
	private readonly rooms: ReadonlyMap<string, ReadonlyArray<Format>>;

	private constructor(rooms: ReadonlyMap<string, ReadonlyArray<Format>>) {
		this.rooms = rooms;
	}

	static empty(): RoomRules {
		return new RoomRules(new Map());
	}

	static from_config(rooms: RoomsConfig): RoomRules {
		let map = new Map<string, ReadonlyArray<Format>>();
		for (let [room_id, info] of Object.entries(rooms)) {
			map.set(room_id, Object.freeze(compile_formats(room_id, info.formats, "lenient")));
		}
		return new RoomRules(map);
	}

	/* undefined means the room has no rules at all, not an empty rule list */
	get(room_id: string): ReadonlyArray<Format> | undefined {
		return this.rooms.get(room_id);
	}

	has(room_id: string): boolean {
		return this.rooms.has(room_id);
	}

	get size(): number {
		return this.rooms.size;
	}

	with_format(room_id: string, pattern: string): RoomRules {
		let added = compile_formats(room_id, [pattern], "strict");
		let map = new Map(this.rooms);
		map.set(room_id, Object.freeze([...(this.rooms.get(room_id) ?? []), ...added]));
		return new RoomRules(map);
	}

	to_config(): Record<string, { formats: Array<string> }> {
		let rooms: Record<string, { formats: Array<string> }> = {};
		for (let [room_id, formats] of this.rooms) {
			rooms[room_id] = { formats: formats.map((format) => format.pattern) };
		}
		return rooms;
	}
}

export { RoomRules, FormatError, compile_format, compile_formats };
export type { Format, RoomsConfig, CompileMode };
