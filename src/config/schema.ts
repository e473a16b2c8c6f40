import { z } from "zod";
import { DEFAULT_GENERATOR } from "../core/matrix.js";

export const BuildSchema = z
	.object({
		name: z.string().optional(),
		image: z.string().optional(),
		args: z.string().optional(),
		jobs: z.number().int().positive().optional(),
		env: z.record(z.string()).optional(),
		coverage: z.boolean().optional(),
		platform: z.string().optional(),
		commandArgs: z.string().optional(),
	})
	.strict();

export const ConfigSchema = z
	.object({
		checker: z.string().default(DEFAULT_GENERATOR.checker),
		defaults: z
			.object({
				image: z.string().default(DEFAULT_GENERATOR.image),
				args: z.string().default(DEFAULT_GENERATOR.args),
				jobs: z.number().int().positive().default(DEFAULT_GENERATOR.jobs),
			})
			.strict()
			.default({
				image: DEFAULT_GENERATOR.image,
				args: DEFAULT_GENERATOR.args,
				jobs: DEFAULT_GENERATOR.jobs,
			}),
		builds: z.array(BuildSchema).default([]),
	})
	.strict();

export type MatrixConfig = z.infer<typeof ConfigSchema>;
export type BuildEntry = z.infer<typeof BuildSchema>;
