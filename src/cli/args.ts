import fs from "node:fs";

export type CliCommand = "generate" | "show" | "init";

export type CliOptions = {
	command: CliCommand;
	config?: string;
	ref?: string;
	pretty?: boolean;
	githubOutput?: boolean;
	force?: boolean;
	verbose?: boolean;
	help?: boolean;
	version?: boolean;
	unknown: string[];
	errors: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "generate", unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		if (isCommand(command)) {
			options.command = command;
		} else {
			options.errors.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--config":
				options.config = takeValue("--config", args, options);
				break;
			case "--ref":
				options.ref = takeValue("--ref", args, options);
				break;
			case "--pretty":
				options.pretty = true;
				break;
			case "--github-output":
				options.githubOutput = true;
				break;
			case "--force":
				options.force = true;
				break;
			case "--verbose":
				options.verbose = true;
				break;
			default:
				if (arg) {
					options.unknown.push(arg);
				}
				break;
		}
	}

	return options;
}

export function formatHelp(): string {
	return [
		"ci-matrix <command> [options]",
		"",
		"Commands:",
		"  generate              Print the build matrix as JSON (default)",
		"  show                  Render the build matrix as a table",
		"  init                  Write a starter .ci-matrix.yml",
		"",
		"Options:",
		"  --config <file>       Matrix definition file",
		"  --ref <ref>           Source reference (defaults to $GITHUB_REF)",
		"  --pretty              Print sorted, indented JSON",
		"  --github-output       Also append matrix=<json> to $GITHUB_OUTPUT",
		"  --force               For init, overwrite an existing file",
		"  --verbose             Log a summary to stderr",
		"  -h, --help            Show help",
		"  -v, --version         Show version",
		"",
	].join("\n");
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = JSON.parse(raw) as { version?: string };
	return parsed.version ?? "0.0.0";
}

function isCommand(value: string): value is CliCommand {
	return value === "generate" || value === "show" || value === "init";
}

// A value may itself start with "-", but never with "--".
function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("--")) {
		options.errors.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
