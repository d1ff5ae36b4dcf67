import { Duplex, type DuplexOptions } from "node:stream";

/**
 * In-memory stand-in for a client socket.
 *
 * send() plays the client side; everything the server writes is collected
 * in `writes` (one entry per write call).
 */
export class FakeConnection extends Duplex {
	writes: string[] = [];
	/** When set, every following write fails with this error. */
	writeError: Error | null = null;

	constructor(options: DuplexOptions = {}) {
		super({ allowHalfOpen: true, ...options });
	}

	get output(): string {
		return this.writes.join("");
	}

	/** Client -> server bytes. */
	send(data: string | Buffer): void {
		this.push(data);
	}

	/** Client closes its side of the connection. */
	hangUp(): void {
		this.push(null);
	}

	/** Resolves once the server has written `text` (anywhere in its output). */
	waitForOutput(text: string): Promise<void> {
		return new Promise((resolve) => {
			const check = (): void => {
				if (this.output.includes(text)) {
					this.off("written", check);
					resolve();
				}
			};
			this.on("written", check);
			check();
		});
	}

	override _read(): void {}

	override _write(
		chunk: Buffer,
		_encoding: BufferEncoding,
		callback: (err?: Error | null) => void,
	): void {
		if (this.writeError) {
			callback(this.writeError);
			return;
		}
		this.writes.push(chunk.toString("utf8"));
		this.emit("written");
		callback();
	}
}

/** Let pending stream events and promise continuations run. */
export function settle(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}
