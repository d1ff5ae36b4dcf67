/**
 * LineServer — TCP listener that runs one session per accepted connection.
 *
 * The protocol engine itself knows nothing about sockets; this class owns
 * the transport concerns around it: accepting connections, the client
 * limit, idle timeouts and a graceful shutdown that waits for sessions to
 * finish before force-closing them.
 */

import { randomBytes } from "node:crypto";
import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import { hostname } from "node:os";
import { asError, isDisconnect, SocketTimeoutError } from "./errors.ts";
import { formatReply, UNAVAILABLE } from "./reply.ts";
import type {
	ConnectionInfo,
	LineServerEventMap,
	LineServerOptions,
	Logger,
} from "./types.ts";

// ---- Defaults ----------------------------------------------------------------

const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

export interface ListenOptions {
	port?: number;
	host?: string;
	hostname?: string;
}

function connectionId(): string {
	return BigInt(`0x${randomBytes(10).toString("hex")}`)
		.toString(32)
		.padStart(16, "0");
}

function connectionInfo(socket: Socket): ConnectionInfo {
	return {
		id: connectionId(),
		localAddress: (socket.localAddress ?? "").replace(/^::ffff:/, ""),
		localPort: socket.localPort ?? 0,
		remoteAddress: (socket.remoteAddress ?? "").replace(/^::ffff:/, ""),
		remotePort: socket.remotePort ?? 0,
	};
}

/** The 421 sent to a connection turned away before its session starts. */
export function refusalReply(name: string, closing: boolean): string {
	return formatReply(
		UNAVAILABLE,
		closing
			? `${name} Server shutting down`
			: `${name} Too many connected clients, try again in a moment`,
	);
}

// ---- LineServer ----------------------------------------------------------------

export class LineServer<C> {
	options: Required<LineServerOptions<C>>;
	connections: Map<Socket, ConnectionInfo> = new Map();
	closing = false;

	private _server: Server | null = null;
	private _closeTimeout: ReturnType<typeof setTimeout> | null = null;
	private _closeCheckFn: (() => void) | null = null;
	private _ev = new Map<string, Set<(...args: never[]) => void>>();

	constructor(options: LineServerOptions<C>) {
		const defaults = {
			name: hostname(),
			maxClients: 0,
			socketTimeout: 60_000,
			closeTimeout: 30_000,
			logger: silentLogger,
		};
		this.options = { ...defaults, ...options };
	}

	get logger(): Logger {
		return this.options.logger;
	}

	// ---- Events ------------------------------------------------------------------

	on<K extends keyof LineServerEventMap>(
		event: K,
		listener: (...args: LineServerEventMap[K]) => void,
	): this {
		let s = this._ev.get(event);
		if (!s) {
			s = new Set();
			this._ev.set(event, s);
		}
		s.add(listener as never);
		return this;
	}

	off<K extends keyof LineServerEventMap>(
		event: K,
		listener: (...args: LineServerEventMap[K]) => void,
	): this {
		this._ev.get(event)?.delete(listener as never);
		return this;
	}

	once<K extends keyof LineServerEventMap>(
		event: K,
		listener: (...args: LineServerEventMap[K]) => void,
	): this {
		const w = (...args: LineServerEventMap[K]): void => {
			this.off(event, w);
			listener(...args);
		};
		return this.on(event, w);
	}

	emit<K extends keyof LineServerEventMap>(
		event: K,
		...args: LineServerEventMap[K]
	): void {
		const listeners = this._ev.get(event);
		if (!listeners) return;
		for (const fn of [...listeners]) {
			(fn as (...a: LineServerEventMap[K]) => void)(...args);
		}
	}

	// ---- Lifecycle -----------------------------------------------------------------

	/**
	 * Start listening.
	 *   server.listen(port)
	 *   server.listen(port, host)
	 *   server.listen({ port, host })
	 *   server.listen(port, host, callback)
	 */
	listen(port: number, callback?: () => void): this;
	listen(port: number, host: string, callback?: () => void): this;
	listen(options: ListenOptions, callback?: () => void): this;
	listen(
		portOrOptions: number | ListenOptions,
		hostOrCallback?: string | (() => void),
		callback?: () => void,
	): this {
		let port = 0;
		let listenHost = "0.0.0.0";
		let done = callback;

		if (typeof portOrOptions === "number") {
			port = portOrOptions;
		} else {
			port = portOrOptions.port ?? 0;
			listenHost = portOrOptions.host ?? portOrOptions.hostname ?? listenHost;
		}
		if (typeof hostOrCallback === "string") listenHost = hostOrCallback;
		else if (hostOrCallback) done = hostOrCallback;

		const server = createServer((socket) => this._accept(socket));
		server.on("error", (err) => {
			this.logger.error(`${this.options.name}: listener error: ${err.message}`);
			this.emit("error", err);
		});
		server.once("listening", () => {
			const addr = this.address();
			this.logger.info(
				`${this.options.name}: listening on ${addr ? `${addr.address}:${addr.port}` : listenHost}`,
			);
			done?.();
			this.emit("listening");
		});
		server.listen(port, listenHost);

		this._server = server;
		return this;
	}

	address(): AddressInfo | null {
		const addr = this._server?.address();
		return addr && typeof addr === "object" ? addr : null;
	}

	/**
	 * Stop accepting connections and wait for running sessions to end.
	 * After closeTimeout the remaining clients get a 421 and are disconnected.
	 */
	close(callback?: () => void): this {
		this.closing = true;

		if (this._server) {
			this._server.close();
			this._server = null;
		}

		if (this.connections.size === 0) {
			setImmediate(() => {
				this.emit("close");
				callback?.();
			});
			return this;
		}

		this._closeTimeout = setTimeout(() => {
			this.logger.warn(
				`${this.options.name}: closing ${this.connections.size} session(s) after ${this.options.closeTimeout}ms`,
			);
			for (const socket of this.connections.keys()) {
				socket.end(formatReply(UNAVAILABLE, "Server shutting down"), () =>
					socket.destroy(),
				);
			}
		}, this.options.closeTimeout);

		const checkDone = (): void => {
			if (this.connections.size === 0) {
				this._closeCheckFn = null;
				if (this._closeTimeout) {
					clearTimeout(this._closeTimeout);
					this._closeTimeout = null;
				}
				this.emit("close");
				callback?.();
			}
		};

		this._closeCheckFn = checkDone;
		return this;
	}

	// ---- Connections ---------------------------------------------------------------

	private _accept(socket: Socket): void {
		const info = connectionInfo(socket);
		const { maxClients, name, protocol, socketTimeout } = this.options;

		if (this.closing || (maxClients && this.connections.size >= maxClients)) {
			this.logger.info(
				`[${info.id}] rejected ${info.remoteAddress}: ${this.closing ? "shutting down" : "too many clients"}`,
			);
			socket.on("error", (err) =>
				this.logger.debug(`[${info.id}] error on rejected socket: ${err.message}`),
			);
			socket.end(refusalReply(name, this.closing));
			return;
		}

		if (socketTimeout) {
			socket.setTimeout(socketTimeout);
			socket.on("timeout", () => socket.destroy(new SocketTimeoutError(socketTimeout)));
		}

		let context: C;
		try {
			context = this.options.createContext(info);
		} catch (err) {
			const error = asError(err);
			this.logger.error(`[${info.id}] createContext failed: ${error.message}`);
			socket.destroy();
			this.emit("error", error);
			return;
		}

		this.connections.set(socket, info);
		this.logger.debug(`[${info.id}] connection from ${info.remoteAddress}:${info.remotePort}`);
		this.emit("connect", info);

		void protocol.run(socket, context).then(
			() => this._sessionEnded(socket, info, null),
			(err: unknown) => this._sessionEnded(socket, info, asError(err)),
		);
	}

	private _sessionEnded(socket: Socket, info: ConnectionInfo, err: Error | null): void {
		this.connections.delete(socket);

		if (!err) {
			this.logger.debug(`[${info.id}] session closed`);
		} else if (isDisconnect(err)) {
			this.logger.debug(`[${info.id}] client disconnected: ${err.message}`);
		} else if (err instanceof SocketTimeoutError) {
			this.logger.info(`[${info.id}] ${err.message}, connection dropped`);
		} else {
			this.logger.error(`[${info.id}] session failed: ${err.message}`);
			this.emit("error", err);
		}

		this.emit("sessionEnd", info, err);

		if (this.closing) {
			this._closeCheckFn?.();
		}
	}
}
