import type { Duplex } from "node:stream";
import type { Protocol } from "./protocol.ts";

// ---- Replies --------------------------------------------------------------

export interface Reply {
	/** Integer in [0, 999]; 221 and 421 end the session. */
	code: number;
	/** Lines separated by "\n". */
	message: string;
}

// ---- Session ----------------------------------------------------------------

/** What a handler sees of its session. */
export interface Session<C> {
	/** Application state for this connection, fixed when the session starts. */
	readonly context: C;
	/**
	 * Prompt with (code, message), then collect lines up to `terminator`.
	 * Lines are decoded with `encoding`; the default, latin1, maps each byte
	 * to one character so Buffer.from(line, "latin1") gives the bytes back.
	 */
	readBody(
		code: number,
		message: string,
		terminator: string,
		encoding?: BufferEncoding,
	): Promise<string[]>;
}

// ---- Command table --------------------------------------------------------

export type Handler<C> = (
	args: string[],
	session: Session<C>,
) => Reply | Promise<Reply>;

export interface CommandEntry<C> {
	/**
	 * Command token, matched case-insensitively. An empty token is only
	 * allowed on the first entry and marks the greeting handler.
	 */
	command: string;
	handler: Handler<C>;
}

export interface CommandMatch<C> {
	handler: Handler<C>;
	args: string[];
}

// ---- Transport ------------------------------------------------------------

/** Anything the engine can talk over: a net.Socket, a TLS socket, a test double. */
export type LineStream = Duplex;

// ---- Server ---------------------------------------------------------------

export interface Logger {
	debug(message: string, ...meta: unknown[]): void;
	info(message: string, ...meta: unknown[]): void;
	warn(message: string, ...meta: unknown[]): void;
	error(message: string, ...meta: unknown[]): void;
}

export interface ConnectionInfo {
	id: string;
	localAddress: string;
	localPort: number;
	remoteAddress: string;
	remotePort: number;
}

export interface LineServerOptions<C> {
	protocol: Protocol<C>;
	/** Builds the per-connection context handed to handlers as session.context. */
	createContext: (info: ConnectionInfo) => C;

	// Connection
	name?: string;

	// Limits
	maxClients?: number;
	socketTimeout?: number;
	closeTimeout?: number;

	logger?: Logger;
}

export type LineServerEventMap = {
	listening: [];
	close: [];
	error: [Error];
	connect: [ConnectionInfo];
	sessionEnd: [ConnectionInfo, Error | null];
};
