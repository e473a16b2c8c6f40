export type RunContext = {
	ref?: string;
	tag: string | null;
	branch: string | null;
};

export type BuildOptions = {
	name?: string;
	image?: string;
	/** Configure-style arguments handed to the checker. */
	args?: string;
	jobs?: number;
	env?: Record<string, string>;
	coverage?: boolean;
	/** Target platform, e.g. `linux/386`. Requires buildx. */
	platform?: string;
	/** Extra checker options appended after the configure arguments. */
	commandArgs?: string;
};

export type GeneratorDefaults = {
	checker: string;
	image: string;
	args: string;
	jobs: number;
};

export type JobDescriptor = {
	readonly name: string | null;
	readonly image: string;
	readonly command: string;
	readonly env: Readonly<Record<string, string>>;
	readonly tag: string | null;
	readonly branch: string | null;
	readonly coverage: boolean;
	readonly needsBuildx: boolean;
	readonly createRelease: boolean;
};

export type MatrixRecord = {
	name?: string;
	env: Record<string, string>;
	command: string;
	image: string;
	tag?: string;
	branch?: string;
	coverage: boolean;
	needs_buildx: boolean;
	create_release: boolean;
};

export type MatrixDocument = {
	include: MatrixRecord[];
};
