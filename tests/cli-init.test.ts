import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { renderStarterConfig, runInit, writeStarterConfig } from "../src/cli/init.js";
import { parseConfig } from "../src/config/load-config.js";
import { DEFAULT_ARGS, DEFAULT_CHECKER } from "../src/core/matrix.js";
import { createFakeIo } from "./helpers.js";

describe("init", () => {
	it("renders a starter config that validates", () => {
		expect(parseConfig(renderStarterConfig("noble"))).toEqual({
			checker: DEFAULT_CHECKER,
			defaults: { image: "noble", args: DEFAULT_ARGS, jobs: 2 },
			builds: [{ name: "noble" }, { name: "coverage", coverage: true }],
		});
	});

	it("does not overwrite without force", () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "ci-matrix-init-"));
		const configPath = path.join(repoRoot, ".ci-matrix.yml");

		expect(writeStarterConfig(repoRoot)).toBe("written");
		fs.writeFileSync(configPath, "builds: []\n");
		expect(writeStarterConfig(repoRoot)).toBe("exists");
		expect(fs.readFileSync(configPath, "utf-8")).toBe("builds: []\n");

		expect(writeStarterConfig(repoRoot, { force: true, image: "el9" })).toBe("written");
		expect(parseConfig(fs.readFileSync(configPath, "utf-8")).defaults.image).toBe("el9");
	});

	it("reports results without a terminal", async () => {
		const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "ci-matrix-init-io-"));
		const io = createFakeIo(repoRoot);

		expect(await runInit(io)).toBe(0);
		expect(io.out).toEqual(["Wrote .ci-matrix.yml.\n"]);

		expect(await runInit(io)).toBe(1);
		expect(io.err).toEqual([".ci-matrix.yml already exists. Use --force to overwrite.\n"]);
	});
});
