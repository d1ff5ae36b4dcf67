/**
 * Runs the greeter protocol on a TCP port.
 *
 *   npm run example            # port 1234
 *   PORT=2525 npm run example
 *
 * Then: nc localhost 1234
 */

import { LineServer } from "../src/line-server.ts";
import { createGreeterContext, greeterProtocol } from "./greeter.ts";

const port = Number.parseInt(process.env.PORT ?? "1234", 10);

const server = new LineServer({
	protocol: greeterProtocol,
	createContext: createGreeterContext,
	logger: console,
});

server.on("sessionEnd", (info, err) => {
	if (err) console.log(`[${info.id}] ${err.name}: ${err.message}`);
});

server.listen(port);

process.once("SIGINT", () => {
	server.close(() => process.exit(0));
});
