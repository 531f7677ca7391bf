interface Word {
	text: string;
	/* Offset of the word in the original text */
	start: number;
}

function parse_command(text: string): Array<Word> {
	let words: Array<Word> = [];
	for (let match of text.matchAll(/\S+/g)) {
		words.push({ text: match[0], start: match.index ?? 0 });
	}
	return words;
}

export { parse_command };
export type { Word };
