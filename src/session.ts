/**
 * Per-connection state behind the session every handler receives.
 *
 * A LineSession owns the stream for the lifetime of one runSession() call:
 * it buffers incoming lines, writes replies, and closes the stream exactly
 * once. Handlers are given `handle`, which carries only `context` and
 * readBody(); the rest is driven by the dispatch loop.
 */

import { finished } from "node:stream";
import {
	asError,
	IncompleteBodyError,
	SessionStateError,
} from "./errors.ts";
import { LineReader } from "./line-reader.ts";
import { formatReply } from "./reply.ts";
import type { Handler, LineStream, Reply, Session } from "./types.ts";

// Strip one trailing "\n", then one trailing "\r".
function chop(line: string): string {
	let end = line.length;
	if (end > 0 && line.charCodeAt(end - 1) === 0x0a) end--;
	if (end > 0 && line.charCodeAt(end - 1) === 0x0d) end--;
	return line.slice(0, end);
}

export class LineSession<C> implements Session<C> {
	readonly context: C;
	/** The handler's view of this session. */
	readonly handle: Session<C>;

	private readonly _stream: LineStream;
	private readonly _reader = new LineReader();
	private _failure: Error | null = null;
	private _handlerDepth = 0;
	private _closed = false;

	constructor(stream: LineStream, context: C) {
		this._stream = stream;
		this.context = context;
		this.handle = Object.freeze({
			context,
			readBody: (code: number, message: string, terminator: string, encoding?: BufferEncoding) =>
				this.readBody(code, message, terminator, encoding),
		});

		stream.on("data", (chunk: Buffer | string) => {
			this._reader.feed(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
		});
		stream.on("end", () => this._reader.end());
		// An 'error' event without a listener would be thrown.
		stream.on("error", (err: Error) => this._reader.fail(err));
		stream.on("close", () => this._reader.end());
	}

	/** First transport failure seen by readBody(). Never cleared. */
	get failure(): Error | null {
		return this._failure;
	}

	/**
	 * Ask the client for a multi-line body.
	 *
	 * Sends (code, message) as a normal reply, then reads lines until one
	 * equals `terminator` once its trailing "\n" and "\r" are removed. Body
	 * lines keep their line endings; the terminator line is not returned.
	 * Each line is decoded with `encoding`. With the default, latin1, no
	 * byte is lost: Buffer.from(line, "latin1") is exactly what arrived.
	 *
	 * A transport failure is recorded on the session: whatever the calling
	 * handler returns afterwards, the session ends with that failure. The
	 * promise rejects with IncompleteBodyError holding the lines read so far.
	 *
	 * Only valid while one of this session's handlers is running.
	 */
	async readBody(
		code: number,
		message: string,
		terminator: string,
		encoding: BufferEncoding = "latin1",
	): Promise<string[]> {
		if (this._closed) {
			throw new SessionStateError("readBody() called on a closed session");
		}
		if (this._handlerDepth === 0) {
			throw new SessionStateError("readBody() may only be called from a command handler");
		}
		if (this._failure) {
			throw new IncompleteBodyError([], this._failure);
		}

		const prompt = formatReply(code, message);
		try {
			await this._write(prompt);
		} catch (err) {
			throw new IncompleteBodyError([], this._recordFailure(err));
		}

		const lines: string[] = [];
		for (;;) {
			let line: string;
			try {
				line = (await this._reader.readLine()).toString(encoding);
			} catch (err) {
				throw new IncompleteBodyError(lines, this._recordFailure(err));
			}
			if (chop(line) === terminator) return lines;
			lines.push(line);
		}
	}

	// ---- Engine side ---------------------------------------------------------

	/** Next command line, decoded as UTF-8. */
	async readLine(): Promise<string> {
		return (await this._reader.readLine()).toString("utf8");
	}

	/** Encode a reply and write it in one call. */
	respond(code: number, message: string): Promise<void> {
		return this._write(formatReply(code, message));
	}

	private _write(data: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this._stream.write(data, (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	/** Run a handler with readBody() enabled. */
	async invoke(handler: Handler<C>, args: string[]): Promise<Reply> {
		this._handlerDepth++;
		try {
			return await handler(args, this.handle);
		} finally {
			this._handlerDepth--;
		}
	}

	/**
	 * Close the stream once. Graceful close flushes pending replies before
	 * destroying the stream; otherwise it is destroyed at once.
	 */
	async close(graceful: boolean): Promise<void> {
		if (this._closed) return;
		this._closed = true;

		const stream = this._stream;
		if (!graceful || stream.destroyed) {
			stream.destroy();
			return;
		}

		// Settles on finish, error or premature close, whether or not the
		// stream emits 'close'.
		await new Promise<void>((resolve) => {
			finished(stream, { readable: false }, () => {
				stream.destroy();
				resolve();
			});
			stream.end();
		});
	}

	private _recordFailure(err: unknown): Error {
		this._failure ??= asError(err);
		return this._failure;
	}
}
