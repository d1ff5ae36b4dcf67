export { runSession } from "./src/dispatch.ts";
export {
	ConnectionClosedError,
	IncompleteBodyError,
	isDisconnect,
	ProtocolDefinitionError,
	SessionStateError,
	SocketTimeoutError,
} from "./src/errors.ts";
export { LineReader } from "./src/line-reader.ts";
export { LineServer } from "./src/line-server.ts";
export type { ListenOptions } from "./src/line-server.ts";
export { Protocol, tokenize } from "./src/protocol.ts";
export {
	formatReply,
	GOODBYE,
	HELLO,
	isTerminal,
	reply,
	UNAVAILABLE,
	UNKNOWN_COMMAND,
	UNKNOWN_COMMAND_MESSAGE,
	UNKNOWN_COMMAND_REPLY,
} from "./src/reply.ts";
export { LineSession } from "./src/session.ts";
export type {
	CommandEntry,
	CommandMatch,
	ConnectionInfo,
	Handler,
	LineServerEventMap,
	LineServerOptions,
	LineStream,
	Logger,
	Reply,
	Session,
} from "./src/types.ts";
