import fs from "node:fs";
import path from "node:path";
import { cancel, confirm, intro, isCancel, outro, text } from "@clack/prompts";
import YAML from "yaml";
import { DEFAULT_CONFIG_PATH } from "../config/load-config.js";
import type { MatrixConfig } from "../config/schema.js";
import { DEFAULT_GENERATOR } from "../core/matrix.js";
import type { CliIo } from "./io.js";

export type InitResult = "written" | "exists";

export type InitOptions = {
	image?: string;
	force?: boolean;
};

export function renderStarterConfig(image: string = DEFAULT_GENERATOR.image): string {
	const config: MatrixConfig = {
		checker: DEFAULT_GENERATOR.checker,
		defaults: {
			image,
			args: DEFAULT_GENERATOR.args,
			jobs: DEFAULT_GENERATOR.jobs,
		},
		builds: [{ name: image }, { name: "coverage", coverage: true }],
	};
	return YAML.stringify(config);
}

export function writeStarterConfig(repoRoot: string, options: InitOptions = {}): InitResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (fs.existsSync(configPath) && !options.force) {
		return "exists";
	}
	fs.writeFileSync(configPath, renderStarterConfig(options.image));
	return "written";
}

export async function runInit(io: CliIo, options: InitOptions = {}): Promise<number> {
	if (!io.isTty) {
		return reportInit(io, writeStarterConfig(io.cwd, options));
	}

	intro("ci-matrix init");
	const image = await text({
		message: "Default build image",
		initialValue: options.image ?? DEFAULT_GENERATOR.image,
		validate: (value) => (value.trim() ? undefined : "Image is required."),
	});
	if (isCancel(image)) {
		cancel("Canceled.");
		return 130;
	}

	let force = options.force ?? false;
	if (!force && fs.existsSync(path.join(io.cwd, DEFAULT_CONFIG_PATH))) {
		const overwrite = await confirm({
			message: `${DEFAULT_CONFIG_PATH} already exists. Overwrite it?`,
			initialValue: false,
		});
		if (isCancel(overwrite)) {
			cancel("Canceled.");
			return 130;
		}
		force = overwrite;
	}

	const result = writeStarterConfig(io.cwd, { image: image.trim(), force });
	outro(result === "written" ? `Wrote ${DEFAULT_CONFIG_PATH}.` : "Left existing file untouched.");
	return 0;
}

function reportInit(io: CliIo, result: InitResult): number {
	if (result === "written") {
		io.stdout(`Wrote ${DEFAULT_CONFIG_PATH}.\n`);
		return 0;
	}
	io.stderr(`${DEFAULT_CONFIG_PATH} already exists. Use --force to overwrite.\n`);
	return 1;
}
