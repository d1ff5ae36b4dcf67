/**
 * A small conversational protocol to try the engine with:
 *
 *   S: 220 may i help you?
 *   C: TELL everyone
 *   S: 354-What should I tell them?
 *   S: 354 Tell me, terminate with "."
 *   C: Nothing to say, it's just a meaningless
 *   C: multiline message under 140 characters.
 *   C: .
 *   S: 250 Ok, I'll tell everyone.
 *   C: quit
 *   S: 221 bye
 *
 * Don't speak SMTP to it, it gets offended.
 */

import { Protocol } from "../src/protocol.ts";
import { GOODBYE, HELLO, reply, UNAVAILABLE } from "../src/reply.ts";
import type { Handler, Reply } from "../src/types.ts";

export interface GreeterContext {
	greeted: boolean;
	/** Bodies received through TELL, line endings removed. */
	told: Array<{ to: string; text: string[] }>;
}

export function createGreeterContext(): GreeterContext {
	return { greeted: false, told: [] };
}

type GreeterHandler = Handler<GreeterContext>;

const HELP = ["commands:", "help", "helo", "how are you", "how is [someone]", "tell [someone]", "quit"];
const HOW_USAGE: Reply = reply(501, "usage:\n    how are you\n    how is [name]");

const greet: GreeterHandler = () => reply(HELLO, "may i help you?");

const help: GreeterHandler = () => reply(214, HELP.join("\n"));

const helo: GreeterHandler = (_args, session) => {
	session.context.greeted = true;
	return reply(250, "oh, hi!");
};

const how: GreeterHandler = (args, session) => {
	if (!session.context.greeted) return reply(503, "say helo first");
	const [verb, subject] = args;
	if (args.length !== 2 || subject === undefined) return HOW_USAGE;

	switch (verb) {
		case "are":
			return subject === "you" ? reply(200, "fine, thanks") : HOW_USAGE;
		case "is":
			return reply(201, `${subject} is ok`);
		default:
			return HOW_USAGE;
	}
};

const tell: GreeterHandler = async (args, session) => {
	if (!session.context.greeted) return reply(503, "say helo first");
	if (args.length === 0) return reply(501, "usage: tell [someone]");

	const to = args.join(" ");
	const lines = await session.readBody(
		354,
		'What should I tell them?\nTell me, terminate with "."',
		".",
		"utf8",
	);
	session.context.told.push({ to, text: lines.map((l) => l.replace(/\r?\n$/, "")) });
	return reply(250, `Ok, I'll tell ${to}.`);
};

const smtp: GreeterHandler = () => reply(UNAVAILABLE, "what is it, ESMTP?  service unavailable!");

const quit: GreeterHandler = () => reply(GOODBYE, "bye");

export const greeterProtocol = new Protocol<GreeterContext>([
	{ command: "", handler: greet },
	{ command: "help", handler: help },
	{ command: "helo", handler: helo },
	{ command: "how", handler: how },
	{ command: "tell", handler: tell },
	{ command: "quit", handler: quit },
	{ command: "mail", handler: smtp },
	{ command: "rcpt", handler: smtp },
	{ command: "data", handler: smtp },
]);
