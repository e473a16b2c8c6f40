import { parseRef } from "./ref.js";
import type {
	BuildOptions,
	GeneratorDefaults,
	JobDescriptor,
	MatrixDocument,
	MatrixRecord,
	RunContext,
} from "./types.js";

export const DEFAULT_CHECKER = "src/test/docker/docker-run-checks.sh";

export const DEFAULT_ARGS = [
	"--prefix=/usr",
	"--sysconfdir=/etc",
	"--with-systemdsystemunitdir=/etc/systemd/system",
	"--localstatedir=/var",
].join(" ");

export const DEFAULT_GENERATOR: GeneratorDefaults = {
	checker: DEFAULT_CHECKER,
	image: "bookworm",
	args: DEFAULT_ARGS,
	jobs: 2,
};

const COVERAGE_KEY = "COVERAGE";
const DISTCHECK_KEY = "DISTCHECK";

export type CommandParts = {
	checker: string;
	jobs: number;
	image: string;
	args?: string;
	commandArgs?: string;
	platform?: string;
};

export function needsBuildx(platform?: string): boolean {
	return Boolean(platform);
}

export function composeCommand(parts: CommandParts): string {
	const platform = parts.platform ? `--platform=${parts.platform}` : "";
	return [
		parts.checker,
		`-j${parts.jobs}`,
		`--image=${parts.image}`,
		parts.args ?? "",
		parts.commandArgs ?? "",
		platform,
	]
		.map((part) => part.trim())
		.filter(Boolean)
		.join(" ");
}

export function withCoverage(env: Record<string, string>, coverage: boolean): Record<string, string> {
	const next = { ...env };
	if (coverage) {
		next[COVERAGE_KEY] = "t";
	}
	return next;
}

export function isReleaseBuild(tag: string | null, env: Record<string, string>): boolean {
	return tag !== null && Object.hasOwn(env, DISTCHECK_KEY);
}

/**
 * Ordered, append-only collection of CI jobs. The run context is read once
 * from the reference given at construction and shared by every job.
 */
export class BuildMatrix {
	readonly context: RunContext;
	readonly defaults: GeneratorDefaults;
	private readonly jobs: JobDescriptor[] = [];

	constructor(ref?: string, defaults: Partial<GeneratorDefaults> = {}) {
		this.context = Object.freeze(parseRef(ref));
		this.defaults = { ...DEFAULT_GENERATOR, ...defaults };
	}

	get tag(): string | null {
		return this.context.tag;
	}

	get branch(): string | null {
		return this.context.branch;
	}

	get size(): number {
		return this.jobs.length;
	}

	addBuild(options: BuildOptions = {}): JobDescriptor {
		const image = options.image ?? this.defaults.image;
		const coverage = options.coverage ?? false;
		const command = composeCommand({
			checker: this.defaults.checker,
			jobs: options.jobs ?? this.defaults.jobs,
			image,
			args: options.args ?? this.defaults.args,
			commandArgs: options.commandArgs,
			platform: options.platform,
		});
		const env = Object.freeze(withCoverage(options.env ?? {}, coverage));

		const job: JobDescriptor = Object.freeze({
			name: options.name ?? null,
			image,
			command,
			env,
			tag: this.context.tag,
			branch: this.context.branch,
			coverage,
			needsBuildx: needsBuildx(options.platform),
			createRelease: isReleaseBuild(this.context.tag, env),
		});
		this.jobs.push(job);
		return job;
	}

	entries(): readonly JobDescriptor[] {
		return [...this.jobs];
	}

	toJSON(): MatrixDocument {
		return { include: this.jobs.map(toMatrixRecord) };
	}

	toString(): string {
		return JSON.stringify(this.toJSON());
	}
}

export function toMatrixRecord(job: JobDescriptor): MatrixRecord {
	return {
		...(job.name !== null ? { name: job.name } : {}),
		env: { ...job.env },
		command: job.command,
		image: job.image,
		...(job.tag !== null ? { tag: job.tag } : {}),
		...(job.branch !== null ? { branch: job.branch } : {}),
		coverage: job.coverage,
		needs_buildx: job.needsBuildx,
		create_release: job.createRelease,
	};
}
