import type { Grid } from "@quandl-sheets/shared-types";
import { createEnv, loadConfig } from "../src/config";
import { functionsService } from "../src/modules/functions";

type OutputFormat = "json" | "tsv";

type CliArgs = {
	formula: string;
	format: OutputFormat;
};

const USAGE =
	"Usage: invoke-function '=FLEX(\"acme/quandl-series\", \"NASDAQOMX/XNDXT25\")' [--format json|tsv]";

const parseArg = (args: string[], key: string) => {
	const index = args.findIndex((a) => a === key);
	if (index === -1) return null;
	return args[index + 1] ?? null;
};

const parseArgs = (): CliArgs => {
	const args = process.argv.slice(2);
	const format = parseArg(args, "--format") ?? "json";
	const formula = args.find(
		(arg, index) => !arg.startsWith("--") && args[index - 1] !== "--format",
	);

	if (!formula || (format !== "json" && format !== "tsv")) {
		throw new Error(USAGE);
	}
	return { formula, format };
};

const toTsv = (grid: Grid) =>
	grid.map((row) => row.map((cell) => String(cell)).join("\t")).join("\n");

const main = async () => {
	const { formula, format } = parseArgs();
	const env = createEnv(loadConfig());

	const result = await functionsService.evaluateFormula({ formula, env });
	console.error(`ℹ️ [CLI] source=${result.source}, rows=${result.data.length}`);

	process.stdout.write(
		`${format === "tsv" ? toTsv(result.data) : JSON.stringify(result.data, null, 2)}\n`,
	);
};

main().catch((error) => {
	console.error("❌ [CLI]", error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
