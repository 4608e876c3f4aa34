import { zValidator } from "@hono/zod-validator";
import type {
	FunctionErrorResponse,
	FunctionListResponse,
} from "@quandl-sheets/shared-types";
import { type Context, Hono } from "hono";
import { z } from "zod";
import { QuandlApiError } from "../../pkg/util/quandl-api";
import { QuotaExceededError } from "../../utils/quota-manager";
import { SWR, TTL } from "../cache";
import {
	FormulaSyntaxError,
	FunctionArgumentError,
	FunctionNotFoundError,
} from "./errors";
import {
	type FunctionServiceResult,
	type FunctionSource,
	type FunctionsEnv,
	functionsService,
} from "./functions.service";
import { getFunction, listFunctions } from "./registry";

type ErrorStatus = 400 | 404 | 429 | 500 | 502;

/**
 * Map a failed invocation onto a status code and error body
 */
export const toErrorResponse = (
	error: unknown,
): { statusCode: ErrorStatus; body: FunctionErrorResponse } => {
	const detail = error instanceof Error ? error.message : String(error);
	let statusCode: ErrorStatus = 500;
	let code = "INTERNAL_ERROR";
	let message = "Failed to run function";

	if (
		error instanceof FunctionArgumentError ||
		error instanceof FormulaSyntaxError
	) {
		statusCode = 400;
		code = error.code;
		message = detail;
	} else if (error instanceof FunctionNotFoundError) {
		statusCode = 404;
		code = error.code;
		message = detail;
	} else if (error instanceof QuotaExceededError) {
		statusCode = 429;
		code = error.code;
		message = "API rate limit exceeded. Please try again later.";
	} else if (error instanceof QuandlApiError) {
		code = error.code;
		if (error.status === 429) {
			statusCode = 429;
			message = "API rate limit exceeded. Please try again later.";
		} else {
			statusCode = 502;
			message = "External API request failed. Please try again later.";
		}
	}

	return {
		statusCode,
		body: { status: "error", code, message, error: detail },
	};
};

/**
 * Only grids that reflect current upstream data may be cached by clients
 */
export const cacheControlFor = (
	source: FunctionSource,
	ttlSeconds: number,
): string =>
	source === "API" || source === "Memory Cache"
		? `private, max-age=${ttlSeconds}, stale-while-revalidate=${SWR.STANDARD}`
		: "no-store";

const sendGrid = (
	context: Context,
	label: string,
	result: FunctionServiceResult,
	requestStartTime: number,
) => {
	const responseTime = (performance.now() - requestStartTime).toFixed(2);

	console.log(
		`📊 [Functions] ${label}: rows=${result.data.length}, ` +
			`source=${result.source}, time=${responseTime}ms`,
	);

	const env: FunctionsEnv = context.env;
	context.header(
		"Cache-Control",
		cacheControlFor(result.source, env.CACHE_TTL_SECONDS ?? TTL.STANDARD),
	);
	context.header("X-Source", result.source);

	return context.json(result.data);
};

const sendError = (context: Context, label: string, error: unknown) => {
	const { statusCode, body } = toErrorResponse(error);
	if (statusCode >= 500) {
		console.error(`❌ [Functions] ${label} error:`, error);
	} else {
		console.warn(`⚠️ [Functions] ${label} rejected: ${body.error}`);
	}
	return context.json(body, statusCode);
};

const argumentsSchema = z.array(z.unknown());

export const createFunctionsRoutes = () => {
	const functions = new Hono<{ Bindings: FunctionsEnv }>();

	/**
	 * GET /functions - Manifests of every function in the pack
	 */
	functions.get("/", (context) => {
		const body: FunctionListResponse = { status: "success", data: listFunctions() };
		return context.json(body);
	});

	/**
	 * GET /functions/:name - One manifest
	 */
	functions.get("/:name", (context) => {
		const name = context.req.param("name");
		const definition = getFunction({ name });

		if (!definition) {
			return sendError(context, name, new FunctionNotFoundError(name));
		}
		return context.json({ status: "success", data: definition.manifest });
	});

	/**
	 * POST /functions/:name - Run a function
	 * - body: JSON array of positional arguments
	 * - response: grid, header row first
	 */
	functions.post(
		"/:name",
		zValidator("json", argumentsSchema),
		async (context) => {
			const name = context.req.param("name");
			const args = context.req.valid("json");
			const requestStartTime = performance.now();

			try {
				const result = await functionsService.invoke({
					reference: { name },
					args,
					env: context.env,
				});
				return sendGrid(context, name, result, requestStartTime);
			} catch (error) {
				return sendError(context, name, error);
			}
		},
	);

	/**
	 * POST /functions/:owner/:name - Same, addressed as `<org>/<function>`
	 */
	functions.post(
		"/:owner/:name",
		zValidator("json", argumentsSchema),
		async (context) => {
			const owner = context.req.param("owner");
			const name = context.req.param("name");
			const args = context.req.valid("json");
			const requestStartTime = performance.now();

			try {
				const result = await functionsService.invoke({
					reference: { owner, name },
					args,
					env: context.env,
				});
				return sendGrid(context, `${owner}/${name}`, result, requestStartTime);
			} catch (error) {
				return sendError(context, `${owner}/${name}`, error);
			}
		},
	);

	return functions;
};

const formulaBodySchema = z.object({
	formula: z.string().min(1, "Formula is required"),
});

export const createFormulaRoutes = () => {
	const formula = new Hono<{ Bindings: FunctionsEnv }>();

	/**
	 * POST /formula - Evaluate `=FLEX("<org>/<function>", ...)`
	 */
	formula.post("/", zValidator("json", formulaBodySchema), async (context) => {
		const body = context.req.valid("json");
		const requestStartTime = performance.now();

		try {
			const result = await functionsService.evaluateFormula({
				formula: body.formula,
				env: context.env,
			});
			return sendGrid(context, "formula", result, requestStartTime);
		} catch (error) {
			return sendError(context, "formula", error);
		}
	});

	return formula;
};
