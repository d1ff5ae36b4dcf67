/**
 * Reply codes and the wire format for server replies.
 *
 * Only GOODBYE and UNAVAILABLE mean anything to the engine; every other
 * code is passed through to the client as is.
 */

import type { Reply } from "./types.ts";

/** Conventional greeting code. Carries no meaning for the engine. */
export const HELLO = 220;
/** Ends the session once the reply is sent. */
export const GOODBYE = 221;
/** Ends the session once the reply is sent. */
export const UNAVAILABLE = 421;
/** Sent for empty lines and commands missing from the table. */
export const UNKNOWN_COMMAND = 500;
export const UNKNOWN_COMMAND_MESSAGE = "Unknown command";

export const UNKNOWN_COMMAND_REPLY: Readonly<Reply> = Object.freeze({
	code: UNKNOWN_COMMAND,
	message: UNKNOWN_COMMAND_MESSAGE,
});

export function reply(code: number, message = ""): Reply {
	return { code, message };
}

export function isTerminal(code: number): boolean {
	return code === GOODBYE || code === UNAVAILABLE;
}

/**
 * Encode a reply. Every line but the last is sent as "NNN-text", the last
 * as "NNN text"; each ends in CRLF.
 *
 *   formatReply(250, "a\nb") === "250-a\r\n250 b\r\n"
 */
export function formatReply(code: number, message: string): string {
	if (!Number.isInteger(code) || code < 0 || code > 999) {
		throw new RangeError(`Reply code must be an integer in [0, 999], got ${code}`);
	}
	const prefix = String(code).padStart(3, "0");
	const lines = message.split("\n");
	const last = lines.length - 1;

	let out = "";
	for (let i = 0; i < last; i++) {
		out += `${prefix}-${lines[i]}\r\n`;
	}
	return `${out}${prefix} ${lines[last]}\r\n`;
}
