/**
 * The command table: an ordered list of (command, handler) pairs, built once
 * by the application and shared by every session.
 *
 * Matching is first-registration-wins. A token registered twice keeps its
 * first handler; the later entries stay in `entries` but can never be
 * reached, and are listed in `shadowed`.
 */

import { runSession } from "./dispatch.ts";
import { ProtocolDefinitionError } from "./errors.ts";
import type { CommandEntry, CommandMatch, Handler, LineStream } from "./types.ts";

const WHITESPACE = /\s/;

/** Split a command line into whitespace-separated fields. */
export function tokenize(line: string): string[] {
	const trimmed = line.trim();
	return trimmed === "" ? [] : trimmed.split(/\s+/);
}

export class Protocol<C> {
	readonly entries: ReadonlyArray<Readonly<CommandEntry<C>>>;
	/** Handler of the empty-token entry at index 0, run when a session starts. */
	readonly greeting: Handler<C> | null;
	/** Lowercased tokens registered more than once. */
	readonly shadowed: readonly string[];

	private readonly _index: ReadonlyMap<string, Handler<C>>;

	constructor(entries: Iterable<CommandEntry<C>>) {
		const list: Readonly<CommandEntry<C>>[] = [];
		const index = new Map<string, Handler<C>>();
		const shadowed: string[] = [];
		let greeting: Handler<C> | null = null;

		for (const entry of entries) {
			const i = list.length;
			const command = entry.command.toLowerCase();
			list.push(Object.freeze({ command, handler: entry.handler }));

			if (command === "") {
				if (i !== 0) {
					throw new ProtocolDefinitionError(i, "only the first entry may have an empty command");
				}
				greeting = entry.handler;
				continue;
			}
			if (WHITESPACE.test(command)) {
				throw new ProtocolDefinitionError(i, `command "${entry.command}" contains whitespace`);
			}

			if (index.has(command)) {
				if (!shadowed.includes(command)) shadowed.push(command);
				continue;
			}
			index.set(command, entry.handler);
		}

		this.entries = Object.freeze(list);
		this.greeting = greeting;
		this.shadowed = Object.freeze(shadowed);
		this._index = index;
		Object.freeze(this);
	}

	/** Look up the handler for a raw input line. Null for empty or unknown commands. */
	match(line: string): CommandMatch<C> | null {
		const fields = tokenize(line);
		const [first, ...args] = fields;
		if (first === undefined) return null;

		const handler = this._index.get(first.toLowerCase());
		return handler ? { handler, args } : null;
	}

	/** Serve one connection. See runSession(). */
	run(stream: LineStream, context: C): Promise<void> {
		return runSession(this, stream, context);
	}
}
