/**
 * Per-connection dispatch loop.
 *
 *   greet? -> read line -> match -> handler -> reply -> (221/421 ? close : loop)
 *
 * Strictly sequential: one line is read, handled and answered before the
 * next read starts. The only way out is a terminating reply code or a
 * failure; the loop has no idle timeout of its own.
 */

import type { Protocol } from "./protocol.ts";
import { isTerminal, UNKNOWN_COMMAND_REPLY } from "./reply.ts";
import { LineSession } from "./session.ts";
import type { Handler, LineStream, Reply } from "./types.ts";

/**
 * Serve one connection until it ends.
 *
 * Resolves after a handler returned 221 or 421 and the reply was flushed.
 * Rejects with the first fatal error: a read or write failure on `stream`
 * (the peer closing it mid-session included), a failure recorded by
 * readBody(), or an exception thrown by a handler. In every case `stream`
 * has been closed by the time the promise settles.
 */
export async function runSession<C>(
	protocol: Protocol<C>,
	stream: LineStream,
	context: C,
): Promise<void> {
	const session = new LineSession(stream, context);
	try {
		await serve(protocol, session);
	} catch (err) {
		await session.close(false);
		throw err;
	}
	await session.close(true);
}

async function serve<C>(protocol: Protocol<C>, session: LineSession<C>): Promise<void> {
	if (protocol.greeting) {
		const { code, message } = await dispatch(session, protocol.greeting, []);
		await session.respond(code, message);
		if (isTerminal(code)) return;
	}

	for (;;) {
		const line = await session.readLine();
		const match = protocol.match(line);
		const { code, message } = match
			? await dispatch(session, match.handler, match.args)
			: UNKNOWN_COMMAND_REPLY;

		await session.respond(code, message);
		if (isTerminal(code)) return;
	}
}

// A failure recorded by readBody() replaces whatever the handler produced.
async function dispatch<C>(
	session: LineSession<C>,
	handler: Handler<C>,
	args: string[],
): Promise<Reply> {
	let result: Reply;
	try {
		result = await session.invoke(handler, args);
	} catch (err) {
		throw session.failure ?? err;
	}
	if (session.failure) throw session.failure;
	return result;
}
