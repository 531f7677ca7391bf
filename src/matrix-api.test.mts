import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MatrixAPI, MatrixError } from "./matrix-api.mjs";
import { canonical_alias_content } from "./schema.mjs";
import { Util, type HttpResponse } from "./utils.mjs";

function response(code: number, body: object | string): HttpResponse {
	return {
		code: code,
		body: typeof body == "string" ? body : JSON.stringify(body),
		headers: {},
	};
}

describe("MatrixAPI", () => {
	let api: MatrixAPI;

	beforeEach(() => {
		api = new MatrixAPI({
			hostname: "matrix.example.org",
			port: 443,
			protocol: "https:",
			token: "test-token",
		});
		vi.spyOn(Util, "sleep").mockResolvedValue();
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("resolves aliases through the room directory", async () => {
		let request = vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(200, { room_id: "!room:example.org", servers: ["example.org"] }));

		let info = await api.v3_directory("#team:example.org");

		expect(info.room_id).toBe("!room:example.org");
		expect(request).toHaveBeenCalledTimes(1);
		let [options, body] = request.mock.calls[0];
		expect(options.method).toBe("GET");
		expect(options.path).toBe("/_matrix/client/v3/directory/room/%23team%3Aexample.org");
		expect(options.hostname).toBe("matrix.example.org");
		expect(options.headers).toEqual({
			"Authorization": "Bearer test-token",
			"Content-Type": "application/json",
		});
		expect(body).toBeNull();
	});

	it("turns 404 into a not found MatrixError", async () => {
		vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(404, { errcode: "M_NOT_FOUND", error: "Room alias not found" }));

		let err = await api.v3_directory("#missing:example.org").catch((e: unknown) => e);

		expect(err).toBeInstanceOf(MatrixError);
		if (!(err instanceof MatrixError)) return;
		expect(err.code).toBe(404);
		expect(err.errcode).toBe("M_NOT_FOUND");
		expect(err.message).toBe("Room alias not found");
		expect(err.is_not_found()).toBe(true);
		expect(err.is_forbidden()).toBe(false);
	});

	it("turns 403 into a forbidden MatrixError", async () => {
		vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(403, { errcode: "M_FORBIDDEN", error: "Insufficient power level" }));

		let err = await api.v3_put_state("!room:example.org", "m.room.canonical_alias", {}).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(MatrixError);
		if (!(err instanceof MatrixError)) return;
		expect(err.is_forbidden()).toBe(true);
		expect(err.message).toBe("Insufficient power level");
	});

	it("falls back to the status phrase for bodies that are not Matrix errors", async () => {
		vi.spyOn(Util, "request").mockResolvedValueOnce(response(400, "<html>oops</html>"));

		let err = await api.v3_whoami().catch((e: unknown) => e);

		expect(err).toBeInstanceOf(MatrixError);
		if (!(err instanceof MatrixError)) return;
		expect(err.errcode).toBe("M_UNKNOWN");
		expect(err.message).toBe("400 Bad Request");
	});

	it("waits out rate limits and retries", async () => {
		vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(429, { errcode: "M_LIMIT_EXCEEDED", retry_after_ms: 1500 }))
			.mockResolvedValueOnce(response(200, { user_id: "@bot:example.org" }));

		expect(await api.v3_whoami()).toBe("@bot:example.org");
		expect(vi.mocked(Util.sleep).mock.calls).toEqual([[1500], [2000]]);
	});

	it("backs off on rate limits that give no wait time", async () => {
		let request = vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(429, { errcode: "M_LIMIT_EXCEEDED" }))
			.mockResolvedValueOnce(response(429, { errcode: "M_LIMIT_EXCEEDED" }))
			.mockResolvedValueOnce(response(200, { user_id: "@bot:example.org" }));

		expect(await api.v3_whoami()).toBe("@bot:example.org");
		expect(request).toHaveBeenCalledTimes(3);
		expect(vi.mocked(Util.sleep).mock.calls).toEqual([[2000], [8000]]);
	});

	it("retries server errors with backoff", async () => {
		let request = vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(502, "Bad Gateway"))
			.mockRejectedValueOnce(new Error("socket hang up"))
			.mockResolvedValueOnce(response(200, { user_id: "@bot:example.org" }));

		expect(await api.v3_whoami()).toBe("@bot:example.org");
		expect(request).toHaveBeenCalledTimes(3);
		expect(vi.mocked(Util.sleep).mock.calls).toEqual([[2000], [8000]]);
	});

	it("reads and writes room state", async () => {
		let request = vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(200, { alias: "#team:example.org", alt_aliases: ["#team:other.org"], custom: 1 }))
			.mockResolvedValueOnce(response(200, { event_id: "$state" }));

		let content = await api.v3_state("!room:example.org", "m.room.canonical_alias", canonical_alias_content);
		expect(content).toEqual({ alias: "#team:example.org", alt_aliases: ["#team:other.org"], custom: 1 });

		let event_id = await api.v3_put_state("!room:example.org", "m.room.canonical_alias", {
			...content,
			alt_aliases: ["#team:other.org", "#team:third.org"],
		});
		expect(event_id).toBe("$state");

		let [get_options] = request.mock.calls[0];
		let [put_options, put_body] = request.mock.calls[1];
		expect(get_options.path).toBe("/_matrix/client/v3/rooms/!room%3Aexample.org/state/m.room.canonical_alias");
		expect(put_options.method).toBe("PUT");
		expect(put_options.path).toBe(get_options.path);
		expect(JSON.parse(put_body ?? "")).toEqual({
			alias: "#team:example.org",
			alt_aliases: ["#team:other.org", "#team:third.org"],
			custom: 1,
		});
	});

	it("keeps the sync token between calls", async () => {
		let request = vi.spyOn(Util, "request")
			.mockResolvedValueOnce(response(200, { next_batch: "s1" }))
			.mockResolvedValueOnce(response(200, { next_batch: "s2", rooms: { join: {} } }));

		let first = await api.v3_sync();
		expect(first?.next_batch).toBe("s1");
		expect(request.mock.calls[0][0].path).toBe("/_matrix/client/v3/sync");

		let second = await api.v3_sync();
		expect(second?.next_batch).toBe("s2");
		expect(request.mock.calls[1][0].path).toBe("/_matrix/client/v3/sync?since=s1&timeout=60000");
		expect(api.sync_status.next).toBe("s2");
	});

	it("drops a rejected sync token", async () => {
		vi.spyOn(Util, "request").mockResolvedValueOnce(response(400, { errcode: "M_UNKNOWN" }));
		api.sync_status.next = "stale";

		expect(await api.v3_sync()).toBeNull();
		expect(api.sync_status.next).toBeNull();
	});

	it("backs off when the server is unavailable", async () => {
		vi.spyOn(Util, "request").mockResolvedValueOnce(response(503, "unavailable"));

		expect(await api.v3_sync()).toBeNull();
		expect(Util.sleep).toHaveBeenCalledWith(4000);
		expect(api.sync_status.timeout).toBe(8000);
	});
});
