import { describe, expect, it } from "vitest";
import {
	BuildMatrix,
	DEFAULT_ARGS,
	DEFAULT_CHECKER,
	composeCommand,
	isReleaseBuild,
	needsBuildx,
	withCoverage,
} from "../src/core/matrix.js";

const DEFAULT_COMMAND = `${DEFAULT_CHECKER} -j2 --image=bookworm ${DEFAULT_ARGS}`;

describe("derived fields", () => {
	it("requires buildx only for a target platform", () => {
		expect(needsBuildx("linux/386")).toBe(true);
		expect(needsBuildx(undefined)).toBe(false);
		expect(needsBuildx("")).toBe(false);
	});

	it("composes the command in fixed order with single spaces", () => {
		expect(
			composeCommand({
				checker: "check.sh",
				jobs: 4,
				image: "el8",
				args: "--enable-docs",
				commandArgs: "--workdir=/src",
				platform: "linux/arm64",
			}),
		).toBe("check.sh -j4 --image=el8 --enable-docs --workdir=/src --platform=linux/arm64");
		expect(composeCommand({ checker: "check.sh", jobs: 2, image: "focal", args: "" })).toBe(
			"check.sh -j2 --image=focal",
		);
	});

	it("adds COVERAGE without touching the caller's env", () => {
		const env = { CC: "gcc" };
		expect(withCoverage(env, true)).toEqual({ CC: "gcc", COVERAGE: "t" });
		expect(withCoverage(env, false)).toEqual({ CC: "gcc" });
		expect(env).toEqual({ CC: "gcc" });
	});

	it("marks release builds only for tagged runs with DISTCHECK", () => {
		expect(isReleaseBuild("v1.0", { DISTCHECK: "" })).toBe(true);
		expect(isReleaseBuild("v1.0", { CC: "gcc" })).toBe(false);
		expect(isReleaseBuild(null, { DISTCHECK: "t" })).toBe(false);
	});
});

describe("build matrix", () => {
	it("builds a default job without a ref", () => {
		const matrix = new BuildMatrix();
		const job = matrix.addBuild();

		expect(job).toEqual({
			name: null,
			image: "bookworm",
			command: DEFAULT_COMMAND,
			env: {},
			tag: null,
			branch: null,
			coverage: false,
			needsBuildx: false,
			createRelease: false,
		});
		expect(matrix.toString()).toBe(
			`{"include":[{"env":{},"command":"${DEFAULT_COMMAND}","image":"bookworm","coverage":false,"needs_buildx":false,"create_release":false}]}`,
		);
	});

	it("marks distcheck jobs for release on tagged runs", () => {
		const matrix = new BuildMatrix("refs/tags/v1.0");
		matrix.addBuild({ name: "dist", env: { DISTCHECK: "t" } });
		matrix.addBuild({ name: "plain" });

		const [dist, plain] = matrix.toJSON().include;
		expect(dist).toEqual({
			name: "dist",
			env: { DISTCHECK: "t" },
			command: DEFAULT_COMMAND,
			image: "bookworm",
			tag: "v1.0",
			coverage: false,
			needs_buildx: false,
			create_release: true,
		});
		expect(dist).not.toHaveProperty("branch");
		expect(plain?.create_release).toBe(false);
	});

	it("never releases on branch runs", () => {
		const matrix = new BuildMatrix("refs/heads/main");
		const job = matrix.addBuild({ env: { DISTCHECK: "t" } });
		expect(job.branch).toBe("main");
		expect(job.tag).toBeNull();
		expect(job.createRelease).toBe(false);
	});

	it("flags platform builds for buildx", () => {
		const matrix = new BuildMatrix();
		const job = matrix.addBuild({ name: "32 bit", platform: "linux/386" });
		expect(job.needsBuildx).toBe(true);
		expect(job.command).toBe(`${DEFAULT_COMMAND} --platform=linux/386`);
	});

	it("injects COVERAGE for coverage builds", () => {
		const env = { CC: "clang-15" };
		const job = new BuildMatrix().addBuild({ coverage: true, env });
		expect(job.env).toEqual({ CC: "clang-15", COVERAGE: "t" });
		expect(job.coverage).toBe(true);
		expect(env).toEqual({ CC: "clang-15" });
	});

	it("applies per-job and generator overrides", () => {
		const matrix = new BuildMatrix(undefined, { checker: "ci/check.sh", jobs: 8 });
		const job = matrix.addBuild({
			image: "fedora38",
			args: "--enable-sanitizers",
			commandArgs: "--workdir=/usr/src/w",
		});
		expect(job.command).toBe(
			"ci/check.sh -j8 --image=fedora38 --enable-sanitizers --workdir=/usr/src/w",
		);
		expect(matrix.addBuild({ jobs: 1, args: "" }).command).toBe(
			"ci/check.sh -j1 --image=bookworm",
		);
	});

	it("keeps registration order", () => {
		const matrix = new BuildMatrix();
		for (const name of ["a", "b", "c"]) {
			matrix.addBuild({ name });
		}
		const parsed = JSON.parse(matrix.toString()) as { include: { name: string }[] };
		expect(parsed.include.map((job) => job.name)).toEqual(["a", "b", "c"]);
		expect(matrix.size).toBe(3);
	});

	it("does not expose its job list for mutation", () => {
		const matrix = new BuildMatrix();
		matrix.addBuild({ name: "a" });
		expect(matrix.entries()).not.toBe(matrix.entries());
		expect(matrix.size).toBe(1);
		expect(Object.isFrozen(matrix.entries()[0])).toBe(true);
	});

	it("round-trips through JSON.parse", () => {
		const matrix = new BuildMatrix("refs/tags/v0.9.0");
		matrix.addBuild({ name: "gcc", env: { CC: "gcc-12", DISTCHECK: "t" } });
		matrix.addBuild({ name: "cov", coverage: true, platform: "linux/arm64", jobs: 3 });

		expect(JSON.parse(matrix.toString())).toEqual(matrix.toJSON());
		expect(JSON.parse(matrix.toString())).toEqual({
			include: [
				{
					name: "gcc",
					env: { CC: "gcc-12", DISTCHECK: "t" },
					command: DEFAULT_COMMAND,
					image: "bookworm",
					tag: "v0.9.0",
					coverage: false,
					needs_buildx: false,
					create_release: true,
				},
				{
					name: "cov",
					env: { COVERAGE: "t" },
					command: `${DEFAULT_CHECKER} -j3 --image=bookworm ${DEFAULT_ARGS} --platform=linux/arm64`,
					image: "bookworm",
					tag: "v0.9.0",
					coverage: true,
					needs_buildx: true,
					create_release: false,
				},
			],
		});
	});
});
