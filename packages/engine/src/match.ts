import {
	type ConfigResult,
	roundsNeeded,
	validateMatchConfig,
} from "./config";
import { chooseComputerMove, pushRecent } from "./opponent";
import { isLegalMove, resolveRound } from "./rules";
import type {
	AdvanceRoundResult,
	Difficulty,
	EngineEvent,
	MatchConfig,
	MatchFormat,
	MatchResult,
	MatchState,
	Move,
	RoundOutcome,
	RoundRecord,
	Rng,
	Ruleset,
} from "./types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cloneState(state: MatchState): MatchState {
	return {
		config: state.config,
		round: state.round,
		phase: state.phase,
		scores: { ...state.scores },
		history: [...state.history],
		humanRecent: [...state.humanRecent],
	};
}

function reject(
	state: MatchState,
	move1: unknown,
	move2: unknown,
	reason: "invalid_move" | "terminal" | "wrong_mode",
	error: string,
): AdvanceRoundResult {
	return {
		ok: false,
		state,
		engineEvents: [
			{
				type: "reject",
				round: currentRound(state),
				move1: String(move1),
				move2: String(move2),
				reason,
			},
		],
		reason,
		error,
	};
}

// ---------------------------------------------------------------------------
// Public API: construction
// ---------------------------------------------------------------------------

export function createMatchState(config: MatchConfig): MatchState {
	return {
		config,
		round: 1,
		phase: "awaiting_round",
		scores: { player1: 0, player2: 0 },
		history: [],
		humanRecent: [],
	};
}

export function resetForRematch(
	state: MatchState,
	config: MatchConfig = state.config,
): MatchState {
	return createMatchState(config);
}

export type SettingsChange = {
	ruleset?: Ruleset;
	format?: MatchFormat;
	difficulty?: Difficulty;
};

export type ChangeSettingsResult =
	| { ok: true; state: MatchState }
	| Extract<ConfigResult, { ok: false }>;

/**
 * Apply a mid-match settings change. The new configuration is validated like
 * a fresh one and the match restarts from round 1 with an empty human-recent
 * buffer.
 */
export function changeSettings(
	state: MatchState,
	changes: SettingsChange,
): ChangeSettingsResult {
	const current = state.config;
	if (current.mode === "multiplayer" && changes.difficulty !== undefined) {
		return {
			ok: false,
			reason: "invalid_config",
			error: "difficulty only applies to single_player matches",
		};
	}
	const validated = validateMatchConfig({
		...current,
		ruleset: changes.ruleset ?? current.ruleset,
		format: changes.format ?? current.format,
		...(current.mode === "single_player"
			? { difficulty: changes.difficulty ?? current.difficulty }
			: {}),
	});
	if (!validated.ok) return validated;
	return { ok: true, state: resetForRematch(state, validated.config) };
}

// ---------------------------------------------------------------------------
// Public API: queries
// ---------------------------------------------------------------------------

/** Index of the round currently open, or of the round just resolved. */
export function currentRound(state: MatchState): number {
	return state.round;
}

export function tieCount(state: MatchState): number {
	return state.history.filter((r) => r.outcome === "tie").length;
}

export function isComplete(state: MatchState): boolean {
	return state.phase === "match_complete";
}

export function checkMatchWinner(state: MatchState): RoundOutcome | null {
	const { format } = state.config;
	if (format.type === "single_round") {
		return state.history.length >= 1
			? (state.history[state.history.length - 1]?.outcome ?? null)
			: null;
	}
	const needed = roundsNeeded(format);
	if (state.scores.player1 >= needed) return "player1";
	if (state.scores.player2 >= needed) return "player2";
	return null;
}

/** Scoreboard merge arguments for a finished match; `null` while it runs. */
export function matchResult(state: MatchState): MatchResult | null {
	if (state.phase !== "match_complete") return null;
	const winner = checkMatchWinner(state);
	const { player1, player2 } = state.config;
	return {
		player1,
		player2,
		winner:
			winner === "player1" ? player1 : winner === "player2" ? player2 : null,
		player1Rounds: state.scores.player1,
		player2Rounds: state.scores.player2,
	};
}

// ---------------------------------------------------------------------------
// Public API: transitions
// ---------------------------------------------------------------------------

/** Close a resolved round and open the next one. */
export function beginNextRound(state: MatchState): MatchState {
	if (state.phase !== "round_resolved") return state;
	return {
		...cloneState(state),
		round: state.history.length + 1,
		phase: "awaiting_round",
	};
}

export function advanceRound(
	state: MatchState,
	move1: Move,
	move2: Move,
): AdvanceRoundResult {
	if (state.phase === "match_complete") {
		return reject(state, move1, move2, "terminal", "Match already complete.");
	}
	const { ruleset } = state.config;
	if (!isLegalMove(ruleset, move1) || !isLegalMove(ruleset, move2)) {
		const bad = isLegalMove(ruleset, move1) ? move2 : move1;
		return reject(
			state,
			move1,
			move2,
			"invalid_move",
			`Move "${String(bad)}" is not legal under the ${ruleset} ruleset.`,
		);
	}

	const nextState = cloneState(beginNextRound(state));
	const outcome = resolveRound(ruleset, move1, move2);
	if (outcome !== "tie") {
		nextState.scores[outcome] += 1;
	}
	const record: RoundRecord = {
		round: nextState.round,
		move1,
		move2,
		outcome,
	};
	nextState.history.push(record);

	const engineEvents: EngineEvent[] = [
		{
			type: "round_resolved",
			round: record.round,
			move1,
			move2,
			outcome,
			scores: { ...nextState.scores },
		},
	];

	const winner = checkMatchWinner(nextState);
	if (winner) {
		nextState.phase = "match_complete";
		engineEvents.push({
			type: "match_ended",
			round: record.round,
			winner,
			scores: { ...nextState.scores },
		});
	} else {
		nextState.phase = "round_resolved";
	}

	return { ok: true, state: nextState, outcome, record, engineEvents };
}

/**
 * Single-player round: the human move is added to the recent-move buffer,
 * the computer policy answers it, and the round is resolved.
 */
export function playComputerRound(
	state: MatchState,
	humanMove: Move,
	rng: Rng,
): AdvanceRoundResult {
	const { config } = state;
	if (config.mode !== "single_player") {
		return reject(
			state,
			humanMove,
			"",
			"wrong_mode",
			"Computer rounds require a single_player match.",
		);
	}
	if (state.phase === "match_complete") {
		return reject(state, humanMove, "", "terminal", "Match already complete.");
	}
	if (!isLegalMove(config.ruleset, humanMove)) {
		return reject(
			state,
			humanMove,
			"",
			"invalid_move",
			`Move "${String(humanMove)}" is not legal under the ${config.ruleset} ruleset.`,
		);
	}

	const humanRecent = pushRecent(state.humanRecent, humanMove);
	const computerMove = chooseComputerMove({
		ruleset: config.ruleset,
		difficulty: config.difficulty,
		humanRecent,
		humanMove,
		rng,
	});
	return advanceRound({ ...state, humanRecent }, humanMove, computerMove);
}
