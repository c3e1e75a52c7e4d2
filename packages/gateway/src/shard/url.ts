import { API_VERSION } from "../constants.js";

/** Appends the version, encoding and optional compression parameters. */
export function buildGatewayUrl(base: string, compression: boolean): string {
	const url = new URL(base);
	url.searchParams.set("v", String(API_VERSION));
	url.searchParams.set("encoding", "json");
	if (compression) {
		url.searchParams.set("compress", "zlib-stream");
	} else {
		url.searchParams.delete("compress");
	}
	return url.toString();
}
