/**
 * Errors raised by the engine and the server around it.
 *
 * Transport failures coming from Node (ECONNRESET, EPIPE, write after
 * destroy) are passed through as they are; these classes only cover the
 * conditions the library itself detects.
 */

/** The peer ended the stream before a complete line arrived. */
export class ConnectionClosedError extends Error {
	public readonly name = "ConnectionClosedError";
	public readonly code = "ECONNCLOSED";

	constructor(
		message = "Connection closed by peer",
		public readonly partialLine = "",
	) {
		super(message);
	}
}

/** The socket was idle for longer than the server's socketTimeout. */
export class SocketTimeoutError extends Error {
	public readonly name = "SocketTimeoutError";
	public readonly code = "ETIMEDOUT";

	constructor(public readonly timeout: number) {
		super(`Socket idle for ${timeout}ms`);
	}
}

/**
 * readBody() lost the connection before the terminator line.
 * `lines` holds what was collected; `cause` is the transport error the
 * session reports when it terminates.
 */
export class IncompleteBodyError extends Error {
	public readonly name = "IncompleteBodyError";

	constructor(
		public readonly lines: string[],
		public readonly cause: Error,
	) {
		super(`Body read failed after ${lines.length} line(s): ${cause.message}`);
	}
}

export class SessionStateError extends Error {
	public readonly name = "SessionStateError";
}

export class ProtocolDefinitionError extends Error {
	public readonly name = "ProtocolDefinitionError";

	constructor(
		public readonly index: number,
		message: string,
	) {
		super(`Command entry ${index}: ${message}`);
	}
}

/** Dirty disconnects that are not worth reporting as server errors. */
export function isDisconnect(err: Error): boolean {
	if (err instanceof ConnectionClosedError) return true;
	const code = "code" in err ? err.code : undefined;
	return code === "ECONNRESET" || code === "EPIPE" || code === "ERR_STREAM_DESTROYED";
}

export function asError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
