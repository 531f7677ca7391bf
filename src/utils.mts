import https from "node:https";
import http from "node:http";
import { getReasonPhrase } from "http-status-codes";

interface HttpResponse {
	code: number;
	body: string;
	headers: http.IncomingHttpHeaders;
}

function sleep(ms: number) {
	return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function status_phrase(code: number) {
	let reason = "";
	try {
		reason = getReasonPhrase(code);
	} catch (err) {
		reason = "Unknown status code";
	}
	return reason;
}

function request(options: https.RequestOptions, body: string | null): Promise<HttpResponse> {
	return new Promise(function (resolve, reject) {
		let on_response = (r: http.IncomingMessage) => {
			let data = "";
			r.setEncoding("utf8");
			r.on("data", (chunk: string) => {
				data += chunk;
			});
			r.on("end", () => {
				resolve({ body: data, code: r.statusCode ?? 0, headers: r.headers });
			});
		};

		let req = options.protocol === "http:"
			? http.request(options, on_response)
			: https.request(options, on_response);

		req.on("error", (err) => {
			reject(err);
		});

		if (body === null) req.end();
		else req.end(body);
	});
}

function escape_html(text: string): string {
	return text
		.replaceAll("&", "&amp;")
		.replaceAll("<", "&lt;")
		.replaceAll(">", "&gt;")
		.replaceAll('"', "&quot;")
		.replaceAll("'", "&#39;");
}

function is_user_id(id: string): id is UserID {
	return id.startsWith("@");
}

function is_room_id(id: string): id is RoomID {
	return id.startsWith("!");
}

let Util = {
	sleep: sleep,
	request: request,
	status_phrase: status_phrase,
	escape_html: escape_html,
	is_user_id: is_user_id,
	is_room_id: is_room_id,
};

export { Util };
export type { HttpResponse };
