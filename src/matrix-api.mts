import type { RequestOptions } from "node:https";
import { StatusCodes } from "http-status-codes";
import type { z } from "zod";

import { Util } from "./utils.mjs";
import type { HttpResponse } from "./utils.mjs";
import {
	directory_response,
	error_body,
	event_id_response,
	join_response,
	sync_response,
	whoami_response,
} from "./schema.mjs";
import type { SyncResponse } from "./schema.mjs";

interface MatrixConnection {
	hostname: string;
	port: number;
	protocol: "https:" | "http:";
	token: string;
}

class MatrixError extends Error {
	code: number;
	errcode: string;
	retry_after_ms: number;

	constructor(code: number, errcode: string, message: string, retry_after_ms = 0) {
		super(message);
		this.name = "MatrixError";
		this.code = code;
		this.errcode = errcode;
		this.retry_after_ms = retry_after_ms;
	}

	static from_response(ret: HttpResponse): MatrixError {
		let fallback = `${ret.code} ${Util.status_phrase(ret.code)}`;
		let json: unknown = null;
		try {
			json = JSON.parse(ret.body);
		} catch (err) {
			return new MatrixError(ret.code, "M_UNKNOWN", fallback);
		}

		let parsed = error_body.safeParse(json);
		if (!parsed.success) {
			return new MatrixError(ret.code, "M_UNKNOWN", fallback);
		}

		return new MatrixError(
			ret.code,
			parsed.data.errcode,
			parsed.data.error ?? fallback,
			parsed.data.retry_after_ms ?? 0,
		);
	}

	is_not_found() {
		return this.code == StatusCodes.NOT_FOUND || this.errcode == "M_NOT_FOUND";
	}

	is_forbidden() {
		return this.code == StatusCodes.FORBIDDEN || this.errcode == "M_FORBIDDEN";
	}
}

class MatrixAPI {
	connection: MatrixConnection;

	txn: number;
	sync_status: {
		next: string | null;
		timeout: number;
	};

	constructor(connection: MatrixConnection) {
		this.txn = new Date().getTime();

		this.sync_status = {
			next: null,
			timeout: 4000,
		};
		this.connection = connection;
	}

	call(path: string, method = "GET"): RequestOptions {
		return {
			method: method,
			path: path,
			hostname: this.connection.hostname,
			port: this.connection.port,
			protocol: this.connection.protocol,
			headers: {
				"Authorization": `Bearer ${this.connection.token}`,
				"Content-Type": "application/json",
			},
		};
	}

	json<T extends z.ZodTypeAny>(ret: HttpResponse, shape: T): z.output<T> {
		return shape.parse(JSON.parse(ret.body));
	}

	async v3_whoami() {
		let ret = await this.request(this.call("/_matrix/client/v3/account/whoami"), null);
		return this.json(ret, whoami_response).user_id;
	}

	async v3_directory(alias: RoomAlias) {
		let call = this.call(`/_matrix/client/v3/directory/room/${encodeURIComponent(alias)}`);
		let ret = await this.request(call, null);
		return this.json(ret, directory_response);
	}

	async v3_join(room_id: RoomID) {
		let call = this.call(`/_matrix/client/v3/rooms/${encodeURIComponent(room_id)}/join`, "POST");
		let ret = await this.request(call, "{}");
		return this.json(ret, join_response).room_id;
	}

	async v3_send(room_id: RoomID, event_type: string, content: object) {
		let txn = (this.txn++).toString();
		let call = this.call(
			`/_matrix/client/v3/rooms/${encodeURIComponent(room_id)}/send/${encodeURIComponent(event_type)}/${txn}`,
			"PUT",
		);
		let ret = await this.request(call, JSON.stringify(content));
		return this.json(ret, event_id_response).event_id;
	}

	async v3_state<T extends z.ZodTypeAny>(room_id: RoomID, type: string, shape: T): Promise<z.output<T>> {
		let call = this.call(
			`/_matrix/client/v3/rooms/${encodeURIComponent(room_id)}/state/${encodeURIComponent(type)}`,
		);
		let ret = await this.request(call, null);
		return this.json(ret, shape);
	}

	async v3_put_state(room_id: RoomID, type: string, content: object) {
		let call = this.call(
			`/_matrix/client/v3/rooms/${encodeURIComponent(room_id)}/state/${encodeURIComponent(type)}`,
			"PUT",
		);
		let ret = await this.request(call, JSON.stringify(content));
		return this.json(ret, event_id_response).event_id;
	}

	/* Returns null when the caller should simply call again */
	async v3_sync(): Promise<SyncResponse | null> {
		let query = "";

		let timeout = 1000 * 60;

		if (this.sync_status.next) {
			query = `?since=${encodeURIComponent(this.sync_status.next)}&timeout=${timeout}`;
		}

		let code: number;
		let body = "";
		try {
			let ret = await Util.request(this.call(`/_matrix/client/v3/sync${query}`), null);
			code = ret.code;
			body = ret.body;
		} catch (err) {
			console.log(`Sync request failed, ${err}`);
			code = StatusCodes.SERVICE_UNAVAILABLE;
		}

		if (code != StatusCodes.OK) {
			console.log(`Sync ${code} ${Util.status_phrase(code)}`);
		}

		if (
			code == StatusCodes.BAD_GATEWAY ||
			code == StatusCodes.GATEWAY_TIMEOUT ||
			code == StatusCodes.SERVICE_UNAVAILABLE ||
			code == StatusCodes.TOO_MANY_REQUESTS ||
			code == StatusCodes.REQUEST_TIMEOUT ||
			code == 524
		) {
			/* Timeout and return, to try again */
			if (this.sync_status.timeout > 1000 * 60 * 10) {
				throw new Error(`Too many failed sync requests: ${code} ${Util.status_phrase(code)}`);
			}
			console.log(
				`Retrying after ${this.sync_status.timeout / 1000} seconds`,
			);
			await Util.sleep(this.sync_status.timeout);
			this.sync_status.timeout *= 2;
			return null;
		}

		if (code == StatusCodes.BAD_REQUEST) {
			/* Reset token and try again. If no token to reset, throw */
			if (this.sync_status.next) {
				this.sync_status.next = null;
				return null;
			}

			throw new Error(`Unrecoverable sync ${code} ${Util.status_phrase(code)}`);
		}

		if (code != StatusCodes.OK) {
			throw new Error(`Unhandled sync ${code} ${Util.status_phrase(code)}`);
		}

		let data = sync_response.parse(JSON.parse(body));
		this.sync_status.next = data.next_batch;

		this.sync_status.timeout = 4000;

		return data;
	}

	async request(options: RequestOptions, body: string | null): Promise<HttpResponse> {
		const first = new Date().getTime();
		const err_out = 5 * 60 * 1000;
		let retry = 0;

		while (true) {
			let now = new Date().getTime();
			if (now - first > err_out) {
				throw new Error(`Request to ${options.path} failed after ${retry} retries`);
			}

			if (retry) {
				console.log(`Retrying request after ${retry ** 2 * 2} seconds...`);
				await Util.sleep(retry ** 2 * 2000);
			}
			retry++;

			let ret: HttpResponse;
			try {
				ret = await Util.request(options, body);
			} catch (err) {
				console.log(`Request to ${options.path} failed, ${err}`);
				continue;
			}

			if (ret.code == StatusCodes.TOO_MANY_REQUESTS) {
				/* Without retry_after_ms the regular backoff applies */
				let limited = MatrixError.from_response(ret);
				if (limited.retry_after_ms > 0) {
					console.log(`Rate limited, waiting ${limited.retry_after_ms}ms`);
					await Util.sleep(limited.retry_after_ms);
				} else {
					console.log("Rate limited");
				}
				continue;
			}

			if (ret.code == StatusCodes.REQUEST_TIMEOUT) {
				console.log(
					`Server responded with ${ret.code} ${Util.status_phrase(ret.code)}`,
				);
				continue;
			}

			let r = Math.floor(ret.code / 100);
			if (r == 4) {
				throw MatrixError.from_response(ret);
			}

			if (r == 5) {
				console.log(
					`Server responded with ${ret.code} ${Util.status_phrase(ret.code)}`,
				);
				continue;
			}

			return ret;
		}
	}
}

export { MatrixAPI, MatrixError };
export type { MatrixConnection };
