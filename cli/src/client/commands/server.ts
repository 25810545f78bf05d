// Server Commands Module
// Connection checks against the remote store and the local reference server

import { getConfig } from "../../shared/config";
import { createRemoteClient } from "../../remote/RemoteClient";
import { createServer, DEFAULT_PORT } from "../../reference-server/server";
import { resolveServerTarget, withErrorExit } from "./shared";
import type { Command } from "commander";

type ConnectionFlags = {
	server?: string;
	apiKey?: string;
};

type ServeFlags = {
	port: string;
	apiKey?: string;
};

function clientFor(flags: ConnectionFlags) {
	const config = getConfig();
	return createRemoteClient({ ...resolveServerTarget(flags, config), requestTimeoutMs: config.REQUEST_TIMEOUT });
}

async function ping(flags: ConnectionFlags): Promise<void> {
	const client = clientFor(flags);
	await client.ping();
	await client.getMe();
	console.log(`Connected to ${client.apiBase}`);
}

async function stats(flags: ConnectionFlags): Promise<void> {
	const statistics = await clientFor(flags).getStatistics();
	console.log(`${statistics.total} assets (${statistics.images} images, ${statistics.videos} videos)`);
}

async function serve(flags: ServeFlags): Promise<void> {
	const port = Number.parseInt(flags.port, 10);
	if (!Number.isInteger(port) || port < 0) {
		throw new Error(`Invalid port: ${flags.port}`);
	}
	const server = await createServer({ port, apiKey: flags.apiKey });
	console.log(`Reference server listening on ${server.url}`);
	await new Promise<void>(resolve => {
		process.once("SIGINT", () => resolve());
	});
	await server.close();
	console.log("Reference server stopped");
}

/**
 * Registers `server ping|stats` and `serve`.
 */
export function registerServerCommands(program: Command): void {
	const serverCommand = program.command("server").description("Check the connection to the remote store");

	serverCommand
		.command("ping")
		.description("Check that the server answers and accepts the API key")
		.option("--server <url>", "Server URL")
		.option("--api-key <key>", "API key for the server")
		.action(withErrorExit(ping));

	serverCommand
		.command("stats")
		.description("Show the server's asset counts")
		.option("--server <url>", "Server URL")
		.option("--api-key <key>", "API key for the server")
		.action(withErrorExit(stats));

	program
		.command("serve")
		.description("Run the in-memory reference server")
		.option("-p, --port <port>", "Port to listen on", String(DEFAULT_PORT))
		.option("--api-key <key>", "Require this API key")
		.action(withErrorExit(serve));
}
