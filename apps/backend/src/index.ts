import { Hono } from "hono";
import type { AppEnv } from "./config";
import {
	createCors,
	createFormulaRoutes,
	createFunctionsRoutes,
	EXPOSED_HEADERS,
	parseOrigins,
	rateLimiter,
	resolveAllowedOrigin,
	secureHeaders,
} from "./modules";
import { getMetrics, logRequest } from "./utils";

export interface AppOptions {
	/** Requests per client IP per minute on function routes */
	rateLimitPerMinute?: number;
}

export type App = Hono<{ Bindings: AppEnv }>;

/**
 * Create the Hono app
 */
export const createApp = ({ rateLimitPerMinute = 60 }: AppOptions = {}): App => {
	const app = new Hono<{ Bindings: AppEnv }>();

	/**
	 * Middleware: Secure Headers
	 */
	app.use(
		"*",
		secureHeaders({
			// Served behind a TLS-terminating proxy, if at all
			hsts: false,
		}),
	);

	/**
	 * Middleware: CORS (dynamic based on environment)
	 */
	app.use("*", async (context, next) => {
		const corsMiddleware = createCors(context.env.APPROVED_ORIGINS);
		return corsMiddleware(context, next);
	});

	/**
	 * Middleware: Rate Limiting (one limiter shared by both paths)
	 */
	const functionsRateLimiter = rateLimiter({
		limit: rateLimitPerMinute,
		windowSec: 60,
	});
	app.use("/functions/*", functionsRateLimiter);
	app.use("/formula", functionsRateLimiter);

	/**
	 * Health check endpoint
	 */
	app.get("/health", (context) => {
		return context.json({
			status: "ok",
			timestamp: new Date().toISOString(),
		});
	});

	/**
	 * Metrics endpoint (for monitoring)
	 */
	app.get("/metrics", (context) => {
		const metrics = getMetrics();
		const quota = context.env.QUOTA.getStats();
		return context.json({
			status: "ok",
			metrics,
			quota,
		});
	});

	app.route("/functions", createFunctionsRoutes());
	app.route("/formula", createFormulaRoutes());

	/**
	 * 404 handler
	 */
	app.notFound((context) => {
		return context.json(
			{
				status: "error",
				code: "NOT_FOUND",
				message: "Not found",
				error: `${context.req.method} ${context.req.path}`,
			},
			404,
		);
	});

	/**
	 * Error handler
	 * CORS headers are set here because the CORS middleware's post-`next()`
	 * headers are not applied to responses built by onError
	 */
	app.onError((error, context) => {
		console.error("❌ [Error]", error);

		const response = context.json(
			{
				status: "error",
				code: "INTERNAL_ERROR",
				message: "Internal server error",
				error: error.message,
			},
			500,
		);

		const allowedOrigin = resolveAllowedOrigin(
			parseOrigins(context.env.APPROVED_ORIGINS),
			context.req.header("origin") ?? "",
		);
		if (allowedOrigin) {
			response.headers.set("Access-Control-Allow-Origin", allowedOrigin);
			if (allowedOrigin !== "*") {
				response.headers.set("Vary", "Origin");
			}
		}
		response.headers.set(
			"Access-Control-Expose-Headers",
			EXPOSED_HEADERS.join(", "),
		);

		return response;
	});

	return app;
};

export class RequestTimeoutError extends Error {
	code = "REQUEST_TIMEOUT";

	constructor(timeoutMs: number) {
		super(`Request timeout after ${timeoutMs / 1000} seconds`);
		this.name = "RequestTimeoutError";
	}
}

/**
 * Timeout wrapper to prevent infinite hangs
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new RequestTimeoutError(timeoutMs)), timeoutMs);
	});

	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Run one request through the app with a timeout, timing and request log
 */
export const handleRequest = async (
	app: App,
	request: Request,
	env: AppEnv,
	timeoutMs = 30000,
): Promise<Response> => {
	const requestStartTime = performance.now();
	const url = new URL(request.url);

	try {
		const response = await withTimeout(
			Promise.resolve(app.fetch(request, env)),
			timeoutMs,
		);

		const durationMs = performance.now() - requestStartTime;
		response.headers.set("X-Response-Time", `${durationMs.toFixed(2)}ms`);

		logRequest(
			url.pathname,
			request.method,
			response.status,
			durationMs,
			response.headers.get("X-Source") ?? undefined,
		);

		return response;
	} catch (error) {
		console.error("❌ [Fetch] Error:", error);
		const durationMs = performance.now() - requestStartTime;
		const status = error instanceof RequestTimeoutError ? 504 : 500;

		logRequest(url.pathname, request.method, status, durationMs, undefined);

		return new Response(
			JSON.stringify({
				status: "error",
				code: error instanceof RequestTimeoutError ? error.code : "INTERNAL_ERROR",
				message: "Internal server error",
				error: error instanceof Error ? error.message : String(error),
			}),
			{
				status,
				headers: {
					"Content-Type": "application/json",
				},
			},
		);
	}
};
