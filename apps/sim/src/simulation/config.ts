import { z } from "zod";

/** Configuration for a batch of simulated matches */
export interface SimulationOptions {
	/** Number of matches to run */
	games: number;
	/** Upper bound on rounds per match; best-of matches can tie indefinitely */
	maxRounds: number;
	/** Seed of the first match; match i uses seed + i */
	seed: number;
	/** Minimum level written by the structured logger */
	logLevel: "debug" | "info" | "warn" | "error";
}

/** Schema for validating simulation options */
export const SimulationOptionsSchema = z.object({
	games: z
		.number()
		.int("games must be an integer")
		.positive("games must be a positive number"),
	maxRounds: z
		.number()
		.int("maxRounds must be an integer")
		.positive("maxRounds must be a positive number"),
	seed: z.number().int("seed must be an integer"),
	logLevel: z.enum(["debug", "info", "warn", "error"]),
});

/** Default configuration values */
export const defaultSimulationOptions: SimulationOptions = {
	games: 200,
	maxRounds: 100,
	seed: 1,
	logLevel: "info",
};

/**
 * Creates a full SimulationOptions from partial options, applying defaults
 */
export function createSimulationOptions(
	options: Partial<SimulationOptions> = {},
): SimulationOptions {
	const merged = {
		...defaultSimulationOptions,
		...options,
	};

	const result = SimulationOptionsSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid simulation options: ${errors}`);
	}

	return result.data;
}
