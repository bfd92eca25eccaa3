import type { ZodError } from "zod";
import {
	type Difficulty,
	type MatchConfig,
	MatchConfigSchema,
	type MatchFormat,
	type Mode,
	type Ruleset,
} from "./types";

export const COMPUTER_NAME = "Computer";

export type MatchConfigInput = {
	player1: string;
	/** Defaults to "Computer" in single-player mode. */
	player2?: string;
	mode: Mode;
	ruleset?: Ruleset;
	format?: MatchFormat;
	/** Single-player only; defaults to "easy". */
	difficulty?: Difficulty;
};

export type ConfigResult =
	| { ok: true; config: MatchConfig }
	| {
			ok: false;
			reason: "invalid_format_parameter" | "invalid_config";
			error: string;
	  };

export const DEFAULT_RULESET: Ruleset = "classic";
export const DEFAULT_FORMAT: MatchFormat = { type: "single_round" };
export const DEFAULT_DIFFICULTY: Difficulty = "easy";

export function formatZodError(error: ZodError): string {
	return error.errors
		.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
		.join("; ");
}

/** `null` when the format's count is usable, otherwise the reason it is not. */
export function formatParameterError(format: MatchFormat): string | null {
	switch (format.type) {
		case "single_round":
			return null;
		case "best_of":
			if (format.rounds < 1) return "best_of rounds must be at least 1";
			if (format.rounds % 2 === 0) {
				return `best_of rounds must be odd (got ${format.rounds})`;
			}
			return null;
		case "first_to":
			return format.wins < 1 ? "first_to wins must be at least 1" : null;
	}
}

export function roundsNeeded(format: MatchFormat): number {
	switch (format.type) {
		case "single_round":
			return 1;
		case "best_of":
			return Math.floor(format.rounds / 2) + 1;
		case "first_to":
			return format.wins;
	}
}

/**
 * Validate an already-assembled config value. Used for fresh configs and for
 * configs read back from persisted state.
 */
export function validateMatchConfig(candidate: unknown): ConfigResult {
	const parsed = MatchConfigSchema.safeParse(candidate);
	if (!parsed.success) {
		const formatIssue = parsed.error.errors.some((e) => e.path[0] === "format");
		return {
			ok: false,
			reason: formatIssue ? "invalid_format_parameter" : "invalid_config",
			error: formatZodError(parsed.error),
		};
	}

	const config: MatchConfig = parsed.data;
	const formatError = formatParameterError(config.format);
	if (formatError) {
		return { ok: false, reason: "invalid_format_parameter", error: formatError };
	}
	if (config.player1 === config.player2) {
		return {
			ok: false,
			reason: "invalid_config",
			error: "player names must be different",
		};
	}
	return { ok: true, config };
}

export function createMatchConfig(input: MatchConfigInput): ConfigResult {
	const base = {
		player1: input.player1,
		ruleset: input.ruleset ?? DEFAULT_RULESET,
		format: input.format ?? DEFAULT_FORMAT,
	};

	if (input.mode === "multiplayer") {
		if (input.difficulty !== undefined) {
			return {
				ok: false,
				reason: "invalid_config",
				error: "difficulty only applies to single_player matches",
			};
		}
		return validateMatchConfig({
			...base,
			mode: "multiplayer",
			player2: input.player2 ?? "",
		});
	}

	return validateMatchConfig({
		...base,
		mode: "single_player",
		player2: input.player2 ?? COMPUTER_NAME,
		difficulty: input.difficulty ?? DEFAULT_DIFFICULTY,
	});
}
