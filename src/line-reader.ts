/**
 * Buffered line reader.
 *
 * Fed raw chunks from the transport, hands out complete lines one at a time
 * through an awaitable readLine(). Lines are returned as the bytes that
 * arrived: the terminating "\n" and any "\r" before it stay attached, and
 * nothing is decoded, so callers decide what to strip and how to read it.
 *
 * No Node streams. No EventEmitter. The session wires the socket to it.
 */

import { ConnectionClosedError } from "./errors.ts";

const LF = 0x0a;

interface Waiter {
	resolve(line: Buffer): void;
	reject(err: Error): void;
}

export class LineReader {
	// Partial line not yet terminated by \n
	private _remainder: Buffer = Buffer.alloc(0);
	private _lines: Buffer[] = [];
	private _waiter: Waiter | null = null;
	private _error: Error | null = null;

	/** Complete lines waiting to be read. */
	get pending(): number {
		return this._lines.length;
	}

	get failed(): boolean {
		return this._error !== null;
	}

	/** Feed a raw chunk from the transport. Ignored once the reader has failed. */
	feed(chunk: Buffer): void {
		if (this._error) return;

		const data = this._remainder.length > 0 ? Buffer.concat([this._remainder, chunk]) : chunk;
		let pos = 0;
		let nl = data.indexOf(LF, pos);
		while (nl !== -1) {
			this._push(data.subarray(pos, nl + 1));
			pos = nl + 1;
			nl = data.indexOf(LF, pos);
		}

		this._remainder = data.subarray(pos);
	}

	/**
	 * The transport ended. Lines already buffered can still be read; after
	 * them readLine() rejects with ConnectionClosedError. An unterminated
	 * tail is dropped and kept on the error as partialLine, one character
	 * per byte (latin1).
	 */
	end(): void {
		const partial = this._remainder.toString("latin1");
		this._remainder = Buffer.alloc(0);
		this.fail(new ConnectionClosedError(undefined, partial));
	}

	/** Record a transport failure. The first failure sticks. */
	fail(err: Error): void {
		if (this._error) return;
		this._error = err;

		if (this._waiter && this._lines.length === 0) {
			const waiter = this._waiter;
			this._waiter = null;
			waiter.reject(err);
		}
	}

	readLine(): Promise<Buffer> {
		const line = this._lines.shift();
		if (line !== undefined) return Promise.resolve(line);
		if (this._error) return Promise.reject(this._error);
		if (this._waiter) {
			return Promise.reject(new Error("readLine() called while another read is pending"));
		}

		return new Promise<Buffer>((resolve, reject) => {
			this._waiter = { resolve, reject };
		});
	}

	private _push(line: Buffer): void {
		if (this._waiter) {
			const waiter = this._waiter;
			this._waiter = null;
			waiter.resolve(line);
			return;
		}
		this._lines.push(line);
	}
}
