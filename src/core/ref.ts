import type { RunContext } from "./types.js";

const BRANCH_PATTERN = /^refs\/heads\/(.*)$/;
const TAG_PATTERN = /^refs\/tags\/(.*)$/;

export function parseRef(ref?: string): RunContext {
	const context: RunContext = { ref, tag: null, branch: null };
	if (!ref) {
		return context;
	}

	const branch = BRANCH_PATTERN.exec(ref);
	if (branch) {
		context.branch = branch[1] ?? "";
		return context;
	}
	const tag = TAG_PATTERN.exec(ref);
	if (tag) {
		context.tag = tag[1] ?? "";
	}
	return context;
}

export function describeRef(context: RunContext): string {
	if (context.tag !== null) {
		return `tag ${context.tag}`;
	}
	if (context.branch !== null) {
		return `branch ${context.branch}`;
	}
	return "no ref";
}
