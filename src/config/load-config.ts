import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigSchema, type MatrixConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: MatrixConfig;
	path: string;
	builtin: boolean;
};

export const DEFAULT_CONFIG_PATH = ".ci-matrix.yml";

const BUILTIN_CONFIG_URL = new URL("../../matrix.default.yml", import.meta.url);

export function loadConfig(repoRoot: string, configPath?: string): ConfigLoadResult {
	if (configPath) {
		const resolved = path.resolve(repoRoot, configPath);
		return { config: readConfigFile(resolved), path: resolved, builtin: false };
	}

	const local = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (fs.existsSync(local)) {
		return { config: readConfigFile(local), path: local, builtin: false };
	}

	const builtin = fileURLToPath(BUILTIN_CONFIG_URL);
	return { config: readConfigFile(builtin), path: builtin, builtin: true };
}

export function parseConfig(raw: string): MatrixConfig {
	const parsed: unknown = YAML.parse(raw);
	return ConfigSchema.parse(parsed ?? {});
}

function readConfigFile(configPath: string): MatrixConfig {
	const raw = fs.readFileSync(configPath, "utf-8");
	return parseConfig(raw);
}
