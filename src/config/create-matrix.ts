import { BuildMatrix } from "../core/matrix.js";
import type { MatrixConfig } from "./schema.js";

export function createMatrix(config: MatrixConfig, ref?: string): BuildMatrix {
	const matrix = new BuildMatrix(ref, {
		checker: config.checker,
		image: config.defaults.image,
		args: config.defaults.args,
		jobs: config.defaults.jobs,
	});
	for (const build of config.builds) {
		matrix.addBuild(build);
	}
	return matrix;
}
