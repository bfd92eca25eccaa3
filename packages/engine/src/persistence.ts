import { z } from "zod";
import { formatZodError, validateMatchConfig } from "./config";
import { checkMatchWinner } from "./match";
import { HUMAN_RECENT_CAPACITY } from "./opponent";
import { isLegalMove, resolveRound } from "./rules";
import {
	type MatchConfig,
	type MatchState,
	MatchStateSchema,
	type Scoreboard,
	ScoreboardSchema,
} from "./types";

export const SAVE_VERSION = 1 as const;

export type DecodeResult<T> =
	| { ok: true; value: T }
	| { ok: false; reason: "malformed_persisted_state"; error: string };

const envelope = <T extends z.ZodTypeAny>(payload: T) =>
	z.object({ version: z.literal(SAVE_VERSION), data: payload }).strict();

const MatchStateEnvelopeSchema = envelope(MatchStateSchema);
const MatchConfigEnvelopeSchema = envelope(z.unknown());
const ScoreboardEnvelopeSchema = envelope(ScoreboardSchema);

function malformed<T>(error: string): DecodeResult<T> {
	return { ok: false, reason: "malformed_persisted_state", error };
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(raw) };
	} catch {
		return { ok: false };
	}
}

function stringify(data: unknown): string {
	return JSON.stringify({ version: SAVE_VERSION, data }, null, 2);
}

// ---------------------------------------------------------------------------
// Match config
// ---------------------------------------------------------------------------

export function serializeMatchConfig(config: MatchConfig): string {
	return stringify(config);
}

export function deserializeMatchConfig(raw: string): DecodeResult<MatchConfig> {
	const json = parseJson(raw);
	if (!json.ok) return malformed("Saved config is not valid JSON.");
	const parsed = MatchConfigEnvelopeSchema.safeParse(json.value);
	if (!parsed.success) return malformed(formatZodError(parsed.error));
	const validated = validateMatchConfig(parsed.data.data);
	if (!validated.ok) return malformed(validated.error);
	return { ok: true, value: validated.config };
}

// ---------------------------------------------------------------------------
// Match state
// ---------------------------------------------------------------------------

/** Reasons a structurally valid state cannot be resumed, empty when sound. */
export function stateInvariantErrors(state: MatchState): string[] {
	const errors: string[] = [];
	const { config, history } = state;
	const { ruleset } = config;

	let p1 = 0;
	let p2 = 0;
	let playedOn = false;
	history.forEach((record, idx) => {
		if (
			!playedOn &&
			checkMatchWinner({
				...state,
				history: history.slice(0, idx),
				scores: { player1: p1, player2: p2 },
			}) !== null
		) {
			playedOn = true;
			errors.push(`history[${idx}] was played after the match was decided`);
		}
		if (record.round !== idx + 1) {
			errors.push(`history[${idx}].round must be ${idx + 1}`);
		}
		if (!isLegalMove(ruleset, record.move1) || !isLegalMove(ruleset, record.move2)) {
			errors.push(`history[${idx}] contains a move outside the ${ruleset} ruleset`);
			return;
		}
		const expected = resolveRound(ruleset, record.move1, record.move2);
		if (record.outcome !== expected) {
			errors.push(`history[${idx}].outcome must be ${expected}`);
		}
		if (expected === "player1") p1++;
		if (expected === "player2") p2++;
	});
	if (state.scores.player1 !== p1 || state.scores.player2 !== p2) {
		errors.push("scores do not match history");
	}

	const expectedRound =
		state.phase === "awaiting_round" ? history.length + 1 : history.length;
	if (state.round !== expectedRound) {
		errors.push(`round must be ${expectedRound} in phase ${state.phase}`);
	}

	const decided = checkMatchWinner(state) !== null;
	if (decided !== (state.phase === "match_complete")) {
		errors.push(
			decided
				? "a decided match must be in phase match_complete"
				: "phase match_complete requires a decided match",
		);
	}

	if (state.humanRecent.length > HUMAN_RECENT_CAPACITY) {
		errors.push(`humanRecent holds more than ${HUMAN_RECENT_CAPACITY} moves`);
	}
	if (config.mode === "multiplayer" && state.humanRecent.length > 0) {
		errors.push("humanRecent must be empty in multiplayer matches");
	}
	if (state.humanRecent.some((m) => !isLegalMove(ruleset, m))) {
		errors.push(`humanRecent contains a move outside the ${ruleset} ruleset`);
	}
	return errors;
}

export function serializeMatchState(state: MatchState): string {
	return stringify(state);
}

export function deserializeMatchState(raw: string): DecodeResult<MatchState> {
	const json = parseJson(raw);
	if (!json.ok) return malformed("Saved game is not valid JSON.");
	const parsed = MatchStateEnvelopeSchema.safeParse(json.value);
	if (!parsed.success) return malformed(formatZodError(parsed.error));

	const data = parsed.data.data;
	const validated = validateMatchConfig(data.config);
	if (!validated.ok) return malformed(`config: ${validated.error}`);

	const state: MatchState = { ...data, config: validated.config };
	const errors = stateInvariantErrors(state);
	if (errors.length > 0) return malformed(errors.join("; "));
	return { ok: true, value: state };
}

// ---------------------------------------------------------------------------
// Scoreboard
// ---------------------------------------------------------------------------

export function serializeScoreboard(scoreboard: Scoreboard): string {
	return stringify(scoreboard);
}

export function deserializeScoreboard(raw: string): DecodeResult<Scoreboard> {
	const json = parseJson(raw);
	if (!json.ok) return malformed("Scoreboard is not valid JSON.");
	const parsed = ScoreboardEnvelopeSchema.safeParse(json.value);
	if (!parsed.success) return malformed(formatZodError(parsed.error));
	const scoreboard = parsed.data.data;
	for (const [name, stats] of Object.entries(scoreboard.players)) {
		if (stats.matchesWon > stats.matchesPlayed) {
			return malformed(`players.${name}: matchesWon exceeds matchesPlayed`);
		}
	}
	return { ok: true, value: scoreboard };
}
