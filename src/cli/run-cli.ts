import { render } from "ink";
import React from "react";
import { ZodError } from "zod";
import { createMatrix } from "../config/create-matrix.js";
import { loadConfig } from "../config/load-config.js";
import type { BuildMatrix } from "../core/matrix.js";
import { describeRef } from "../core/ref.js";
import { buildJobRows, formatPlainLines } from "../tui/format.js";
import { MatrixView } from "../tui/matrix-view.js";
import { type CliOptions, formatHelp, parseArgs, readPackageVersion } from "./args.js";
import { runInit } from "./init.js";
import { type CliIo, processIo } from "./io.js";
import { formatGithubOutput, formatMatrix } from "./output.js";

export async function runCli(argv: string[], io: CliIo = processIo()): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		io.stdout(formatHelp());
		return 0;
	}
	if (args.version) {
		io.stdout(`ci-matrix ${readPackageVersion()}\n`);
		return 0;
	}
	if (args.unknown.length) {
		io.stderr(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		io.stderr("Run `ci-matrix --help` for usage.\n");
		return 2;
	}
	if (args.errors.length) {
		for (const error of args.errors) {
			io.stderr(`${error}\n`);
		}
		return 2;
	}

	if (args.command === "init") {
		return runInit(io, { force: args.force });
	}

	const matrix = resolveMatrix(args, io);
	if (!matrix) {
		return 1;
	}
	if (args.verbose) {
		io.stderr(`Generated ${matrix.size} job(s) for ${describeRef(matrix.context)}\n`);
	}

	if (args.command === "show") {
		await showMatrix(matrix, io, Boolean(args.verbose));
		return 0;
	}
	return writeMatrix(matrix, args, io);
}

function resolveMatrix(args: CliOptions, io: CliIo): BuildMatrix | undefined {
	const ref = args.ref ?? io.env.GITHUB_REF;
	try {
		const { config, path: configPath, builtin } = loadConfig(io.cwd, args.config);
		if (args.verbose) {
			io.stderr(`Using ${builtin ? "built-in matrix" : configPath}\n`);
		}
		return createMatrix(config, ref);
	} catch (error) {
		io.stderr(`Config error: ${describeConfigError(error)}\n`);
		return undefined;
	}
}

function writeMatrix(matrix: BuildMatrix, args: CliOptions, io: CliIo): number {
	let outputFile: string | undefined;
	if (args.githubOutput) {
		outputFile = io.env.GITHUB_OUTPUT;
		if (!outputFile) {
			io.stderr("--github-output requires GITHUB_OUTPUT to be set.\n");
			return 2;
		}
	}

	const json = formatMatrix(matrix, { pretty: args.pretty });
	io.stdout(`${json}\n`);
	if (outputFile) {
		io.appendFile(outputFile, formatGithubOutput(matrix.toString()));
	}
	return 0;
}

async function showMatrix(matrix: BuildMatrix, io: CliIo, showCommands: boolean): Promise<void> {
	const rows = buildJobRows(matrix.entries());
	if (!io.isTty) {
		io.stdout(`${formatPlainLines(matrix.context, rows, showCommands).join("\n")}\n`);
		return;
	}

	const { unmount, waitUntilExit } = render(
		React.createElement(MatrixView, { context: matrix.context, rows, showCommands }),
	);
	unmount();
	await waitUntilExit();
}

function describeConfigError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues
			.map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
			.join("; ");
	}
	return error instanceof Error ? error.message : "Unknown config error.";
}
