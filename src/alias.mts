class AliasSyntaxError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "AliasSyntaxError";
	}
}

interface ParsedAlias {
	alias: RoomAlias;
	localpart: string;
	domain: string;
}

function is_room_alias(text: string): text is RoomAlias {
	return text.startsWith("#");
}

/* #localpart:domain, split on the first ':' so ports stay in the domain */
function parse_alias(alias: string): ParsedAlias {
	if (alias.length == 0) {
		throw new AliasSyntaxError("Alias is empty");
	}
	if (!is_room_alias(alias)) {
		throw new AliasSyntaxError("Aliases start with #");
	}

	let sep = alias.indexOf(":");
	if (sep == -1) {
		throw new AliasSyntaxError("Alias must contain domain separator");
	}
	if (sep == alias.length - 1) {
		throw new AliasSyntaxError("Alias must contain domain");
	}
	if (sep == 1) {
		throw new AliasSyntaxError("Alias must contain localpart");
	}

	return {
		alias: alias,
		localpart: alias.slice(1, sep),
		domain: alias.slice(sep + 1),
	};
}

function get_localpart(alias: string): string {
	return parse_alias(alias).localpart;
}

function get_domain(alias: string): string {
	return parse_alias(alias).domain;
}

function localpart_matches(alias: string | null | undefined, localpart: string): boolean {
	if (!alias) return false;
	try {
		return get_localpart(alias) === localpart;
	} catch (err) {
		if (err instanceof AliasSyntaxError) return false;
		throw err;
	}
}

/* Needs at least one cased character, so "1234" is not lowercase */
function is_lowercase(text: string): boolean {
	return text === text.toLowerCase() && text !== text.toUpperCase();
}

export {
	AliasSyntaxError,
	parse_alias,
	get_localpart,
	get_domain,
	localpart_matches,
	is_lowercase,
	is_room_alias,
};
export type { ParsedAlias };
