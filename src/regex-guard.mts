import { Worker } from "node:worker_threads";

/*
 * Bounded-time regex matching.
 *
 * Every call gets a worker thread of its own, which is terminated once the
 * deadline passes. Nothing is shared between calls, so any number of them can
 * be in flight at once. A timed out, cancelled or crashed evaluation counts as
 * "no match".
 */

const matcher_source = `
const { parentPort, workerData } = require("node:worker_threads");
const { sources, candidate } = workerData;
let index = -1;
for (let i = 0; i < sources.length; i++) {
	if (new RegExp(sources[i]).test(candidate)) {
		index = i;
		break;
	}
}
parentPort.postMessage(index);
`;

interface MatchOptions {
	timeout_ms?: number;
	signal?: AbortSignal;
}

/* max(2, 0.5 per pattern) units, a unit being a second by default */
function deadline_ms(pattern_count: number, unit_ms = 1000): number {
	return Math.max(2, pattern_count * 0.5) * unit_ms;
}

/* Resolves to the index of the first matching source, or -1 */
function first_match(sources: ReadonlyArray<string>, candidate: string, options: MatchOptions = {}): Promise<number> {
	let timeout_ms = options.timeout_ms ?? deadline_ms(sources.length);
	let signal = options.signal;

	if (sources.length == 0 || signal?.aborted) {
		return Promise.resolve(-1);
	}

	return new Promise((resolve) => {
		let worker = new Worker(matcher_source, {
			eval: true,
			workerData: { sources: [...sources], candidate: candidate },
		});

		let settled = false;
		let finish = (index: number) => {
			if (settled) return;
			settled = true;

			clearTimeout(timer);
			signal?.removeEventListener("abort", on_abort);

			worker.terminate().catch((err: unknown) => {
				console.warn("Failed to terminate regex worker:", err);
			});
			resolve(index);
		};

		let on_abort = () => {
			console.log("Regex evaluation cancelled");
			finish(-1);
		};

		let timer = setTimeout(() => {
			console.warn(`Regex evaluation exceeded ${timeout_ms}ms, treating as no match`);
			finish(-1);
		}, timeout_ms);

		worker.on("message", (index: unknown) => {
			finish(typeof index == "number" ? index : -1);
		});
		worker.on("error", (err) => {
			console.error("Regex evaluation failed:", err);
			finish(-1);
		});
		worker.on("exit", () => {
			finish(-1);
		});

		signal?.addEventListener("abort", on_abort, { once: true });
	});
}

async function match_any(sources: ReadonlyArray<string>, candidate: string, options: MatchOptions = {}): Promise<boolean> {
	return (await first_match(sources, candidate, options)) >= 0;
}

export { match_any, first_match, deadline_ms };
export type { MatchOptions };
