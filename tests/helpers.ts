import type { CliIo } from "../src/cli/io.js";

export type FakeIo = CliIo & {
	out: string[];
	err: string[];
	appended: { filePath: string; text: string }[];
};

export function createFakeIo(cwd: string, env: NodeJS.ProcessEnv = {}): FakeIo {
	const out: string[] = [];
	const err: string[] = [];
	const appended: { filePath: string; text: string }[] = [];
	return {
		cwd,
		env,
		isTty: false,
		out,
		err,
		appended,
		stdout: (text) => {
			out.push(text);
		},
		stderr: (text) => {
			err.push(text);
		},
		appendFile: (filePath, text) => {
			appended.push({ filePath, text });
		},
	};
}
