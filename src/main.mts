import fs from "node:fs/promises";

import { AltAliasBot } from "./altalias.mjs";
import { Bot } from "./bot.mjs";
import { ConfigStore } from "./config.mjs";

async function main() {
	let path = process.env.ALTALIAS_CONFIG ?? "config/config.yaml";
	let store = await ConfigStore.load(path);

	let bot = new Bot(store);

	bot.cmd.md += "\n# Alias commands\n";

	let altalias = new AltAliasBot(bot.api, store);
	altalias.command().register(bot.cmd);

	if (process.env.MAKE_DOCS == "1") {
		console.log("Generate docs");
		await fs.mkdir("docs", { recursive: true });
		await fs.writeFile("docs/commands.md", bot.cmd.md);
		process.exit(0);
	}

	store.watch();

	let shutdown = (signal: string) => {
		console.log(`Received ${signal}, shutting down`);
		bot.exit = true;
		store.close().then(
			() => process.exit(0),
			(err: unknown) => {
				console.error("Failed to close config watcher:", err);
				process.exit(1);
			},
		);
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);

	await bot.init();
	await bot.sync();
}

try {
	await main();
} catch (err) {
	console.error(err);
	process.exit(1);
}
