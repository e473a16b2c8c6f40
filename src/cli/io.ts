import fs from "node:fs";
import process from "node:process";

export type CliIo = {
	cwd: string;
	env: NodeJS.ProcessEnv;
	isTty: boolean;
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	appendFile: (filePath: string, text: string) => void;
};

export function processIo(): CliIo {
	return {
		cwd: process.cwd(),
		env: process.env,
		isTty: Boolean(process.stdout.isTTY && process.stdin.isTTY),
		stdout: (text) => {
			process.stdout.write(text);
		},
		stderr: (text) => {
			process.stderr.write(text);
		},
		appendFile: (filePath, text) => {
			fs.appendFileSync(filePath, text);
		},
	};
}
