import { describeRef } from "../core/ref.js";
import type { JobDescriptor, RunContext } from "../core/types.js";

export type JobRow = {
	id: string;
	name: string;
	image: string;
	flags: string;
	env: string;
	command: string;
};

export const COLUMNS = ["name", "image", "flags", "env"] as const;

export function buildJobRows(jobs: readonly JobDescriptor[]): JobRow[] {
	return jobs.map((job, index) => ({
		id: `job-${index}`,
		name: job.name ?? `#${index + 1}`,
		image: job.image,
		flags: formatFlags(job),
		env: formatEnv(job.env),
		command: job.command,
	}));
}

export function formatFlags(job: JobDescriptor): string {
	const flags = [
		job.needsBuildx ? "buildx" : "",
		job.coverage ? "coverage" : "",
		job.createRelease ? "release" : "",
	].filter(Boolean);
	return flags.length > 0 ? flags.join(",") : "-";
}

export function formatEnv(env: Readonly<Record<string, string>>): string {
	const entries = Object.keys(env)
		.sort()
		.map((key) => `${key}=${env[key]}`);
	return entries.length > 0 ? entries.join(" ") : "-";
}

export function formatTitle(context: RunContext, count: number): string {
	return `Build matrix · ${describeRef(context)} · ${count} job(s)`;
}

export function columnWidths(rows: JobRow[]): Record<(typeof COLUMNS)[number], number> {
	const widths = { name: 4, image: 5, flags: 5, env: 3 };
	for (const row of rows) {
		for (const column of COLUMNS) {
			widths[column] = Math.max(widths[column], row[column].length);
		}
	}
	return widths;
}

export function formatPlainLines(
	context: RunContext,
	rows: JobRow[],
	showCommands = false,
): string[] {
	const widths = columnWidths(rows);
	const line = (cells: Record<(typeof COLUMNS)[number], string>): string =>
		COLUMNS.map((column) => cells[column].padEnd(widths[column]))
			.join("  ")
			.trimEnd();

	return [
		formatTitle(context, rows.length),
		line({ name: "NAME", image: "IMAGE", flags: "FLAGS", env: "ENV" }),
		...rows.flatMap((row) => (showCommands ? [line(row), `  ${row.command}`] : [line(row)])),
	];
}
