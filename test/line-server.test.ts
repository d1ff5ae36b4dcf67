/**
 * LineServer tests.
 *
 * Starts a LineServer on 127.0.0.1 with an OS-assigned port, talks to it
 * over a plain TCP socket and asserts on the raw reply lines.
 */

import { connect, type Socket } from "node:net";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createGreeterContext, greeterProtocol, type GreeterContext } from "../examples/greeter.ts";
import { LineServer, refusalReply } from "../src/line-server.ts";
import type { ConnectionInfo, LineServerOptions } from "../src/types.ts";

// ---- TCP test client -------------------------------------------------------

class LineClient {
	private socket: Socket | null = null;
	private buffer = "";
	private waiting: ((line: string | null) => void) | null = null;
	private lines: string[] = [];
	private ended = false;

	connect(port: number): Promise<void> {
		return new Promise((resolve, reject) => {
			const socket = connect({ host: "127.0.0.1", port }, () => resolve());
			socket.setEncoding("utf8");
			socket.on("error", reject);
			socket.on("data", (chunk: string) => {
				this.buffer += chunk;
				let nl = this.buffer.indexOf("\n");
				while (nl !== -1) {
					const line = this.buffer.slice(0, nl).replace(/\r$/, "");
					this.buffer = this.buffer.slice(nl + 1);
					nl = this.buffer.indexOf("\n");
					this.deliver(line);
				}
			});
			socket.on("close", () => {
				this.ended = true;
				this.deliver(null);
			});
			this.socket = socket;
		});
	}

	/** Next reply line, or null once the server closed the connection. */
	readLine(): Promise<string | null> {
		const line = this.lines.shift();
		if (line !== undefined) return Promise.resolve(line);
		if (this.ended) return Promise.resolve(null);
		return new Promise((resolve) => {
			this.waiting = resolve;
		});
	}

	/** Read through the final "NNN text" line of a reply. */
	async readReply(): Promise<string[]> {
		const lines: string[] = [];
		for (;;) {
			const line = await this.readLine();
			if (line === null) return lines;
			lines.push(line);
			if (!/^\d{3}-/.test(line)) return lines;
		}
	}

	send(line: string): void {
		this.socket?.write(`${line}\r\n`);
	}

	close(): void {
		this.socket?.destroy();
	}

	private deliver(line: string | null): void {
		if (this.waiting) {
			const resolve = this.waiting;
			this.waiting = null;
			resolve(line);
		} else if (line !== null) {
			this.lines.push(line);
		}
	}
}

// ---- Server factory --------------------------------------------------------

async function startServer(
	opts: Partial<LineServerOptions<GreeterContext>> = {},
): Promise<{ server: LineServer<GreeterContext>; port: number }> {
	const server = new LineServer<GreeterContext>({
		protocol: greeterProtocol,
		createContext: createGreeterContext,
		name: "test.local",
		...opts,
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const port = server.address()?.port ?? 0;
	return { server, port };
}

function closeServer(server: LineServer<GreeterContext>): Promise<void> {
	return new Promise((resolve) => server.close(resolve));
}

// ============================================================================

describe("LineServer – sessions", () => {
	let server: LineServer<GreeterContext>;
	let port: number;
	let client: LineClient;

	beforeEach(async () => {
		({ server, port } = await startServer());
		client = new LineClient();
		await client.connect(port);
	});

	afterEach(async () => {
		client.close();
		await closeServer(server);
	});

	test("greets, answers and says goodbye", async () => {
		expect(await client.readReply()).toEqual(["220 may i help you?"]);

		client.send("helo");
		expect(await client.readReply()).toEqual(["250 oh, hi!"]);

		client.send("how are you");
		expect(await client.readReply()).toEqual(["200 fine, thanks"]);

		client.send("quit");
		expect(await client.readReply()).toEqual(["221 bye"]);
		expect(await client.readLine()).toBeNull();
	});

	test("collects a body through readBody", async () => {
		await client.readReply();
		client.send("helo");
		await client.readReply();

		client.send("tell everyone");
		expect(await client.readReply()).toEqual([
			"354-What should I tell them?",
			'354 Tell me, terminate with "."',
		]);
		client.send("hello there");
		client.send(".");
		expect(await client.readReply()).toEqual(["250 Ok, I'll tell everyone."]);
	});

	test("each connection gets its own context", async () => {
		await client.readReply();
		client.send("helo");
		await client.readReply();

		const other = new LineClient();
		await other.connect(port);
		await other.readReply();
		other.send("how are you");
		expect(await other.readReply()).toEqual(["503 say helo first"]);
		other.close();
	});
});

describe("LineServer – events", () => {
	test("reports connect and a clean session end", async () => {
		const { server, port } = await startServer();
		const connected: ConnectionInfo[] = [];
		server.on("connect", (info) => connected.push(info));
		const ended = new Promise<[ConnectionInfo, Error | null]>((resolve) =>
			server.once("sessionEnd", (info, err) => resolve([info, err])),
		);

		const client = new LineClient();
		await client.connect(port);
		await client.readReply();
		client.send("quit");
		await client.readReply();

		const [info, err] = await ended;
		expect(err).toBeNull();
		expect(connected).toHaveLength(1);
		expect(info.id).toBe(connected[0]?.id);
		expect(info.remoteAddress).toBe("127.0.0.1");
		expect(server.connections.size).toBe(0);

		client.close();
		await closeServer(server);
	});

	test("a client that drops the connection is not a server error", async () => {
		const { server, port } = await startServer();
		const errors: Error[] = [];
		server.on("error", (err) => errors.push(err));
		const ended = new Promise<Error | null>((resolve) =>
			server.once("sessionEnd", (_info, err) => resolve(err)),
		);

		const client = new LineClient();
		await client.connect(port);
		await client.readReply();
		client.close();

		const err = await ended;
		expect(err).not.toBeNull();
		expect(errors).toEqual([]);
		await closeServer(server);
	});

	test("idle sockets are dropped after socketTimeout", async () => {
		const { server, port } = await startServer({ socketTimeout: 50 });
		const ended = new Promise<Error | null>((resolve) =>
			server.once("sessionEnd", (_info, err) => resolve(err)),
		);

		const client = new LineClient();
		await client.connect(port);
		await client.readReply();

		const err = await ended;
		expect(err?.name).toBe("SocketTimeoutError");
		expect(await client.readLine()).toBeNull();
		await closeServer(server);
	});
});

describe("LineServer – limits and shutdown", () => {
	test("rejects clients over maxClients", async () => {
		const { server, port } = await startServer({ maxClients: 1 });

		const first = new LineClient();
		await first.connect(port);
		expect(await first.readReply()).toEqual(["220 may i help you?"]);

		const second = new LineClient();
		await second.connect(port);
		expect(await second.readReply()).toEqual([
			"421 test.local Too many connected clients, try again in a moment",
		]);
		expect(await second.readLine()).toBeNull();

		first.close();
		second.close();
		await closeServer(server);
	});

	test("a refused connection is told why", () => {
		expect(refusalReply("test.local", true)).toBe("421 test.local Server shutting down\r\n");
		expect(refusalReply("test.local", false)).toBe(
			"421 test.local Too many connected clients, try again in a moment\r\n",
		);
	});

	test("close() waits for sessions, then disconnects them", async () => {
		const { server, port } = await startServer({ closeTimeout: 50 });
		const client = new LineClient();
		await client.connect(port);
		await client.readReply();

		let closed = false;
		const shutdown = closeServer(server).then(() => {
			closed = true;
		});
		expect(closed).toBe(false);

		await shutdown;
		expect(closed).toBe(true);
		expect(await client.readReply()).toEqual(["421 Server shutting down"]);
		expect(await client.readLine()).toBeNull();
		expect(server.connections.size).toBe(0);
	});
});
