import { serve } from "@hono/node-server";
import { createEnv, loadConfig } from "./config";
import { createApp, handleRequest } from "./index";

/**
 * Node.js entry point
 */
const config = loadConfig();
const env = createEnv(config);
const app = createApp({ rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE });

if (!config.QUANDL_API_KEY) {
	console.warn("⚠️ [Server] QUANDL_API_KEY is not set; functions will return empty grids");
}

const server = serve(
	{
		// Node bindings ride along so the rate limiter can read the socket address
		fetch: (request, bindings) =>
			handleRequest(app, request, { ...env, ...bindings }, config.REQUEST_TIMEOUT_MS),
		port: config.PORT,
	},
	(info) => {
		console.log(`🚀 [Server] Listening on http://localhost:${info.port}`);
	},
);

const shutdown = (signal: string) => {
	console.log(`🛑 [Server] ${signal} received, closing`);
	server.close((error) => {
		if (error) {
			console.error("❌ [Server] Close failed:", error);
			process.exit(1);
		}
		process.exit(0);
	});
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
