import type { BuildMatrix } from "../core/matrix.js";

export type FormatOptions = {
	pretty?: boolean;
};

export function formatMatrix(matrix: BuildMatrix, options: FormatOptions = {}): string {
	if (!options.pretty) {
		return matrix.toString();
	}
	return JSON.stringify(sortKeys(matrix.toJSON()), null, 2);
}

export function formatGithubOutput(json: string): string {
	return `matrix=${json}\n`;
}

function sortKeys(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (value && typeof value === "object") {
		return Object.fromEntries(
			Object.entries(value)
				.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
				.map(([key, item]) => [key, sortKeys(item)]),
		);
	}
	return value;
}
