import {
	type AdvanceRoundResult,
	advanceRound,
	checkMatchWinner,
	createMatchState,
	ENGINE_VERSION,
	legalMoves,
	type MatchConfig,
	mulberry32,
	playComputerRound,
	pushRecent,
} from "@rps-match/engine";
import type { z } from "zod";
import { log } from "./obs/log";
import type {
	Bot,
	EngineEvent,
	MatchEndReason,
	MatchLog,
	MatchLogSchema,
	MatchState,
	Move,
	PlayerSlot,
	SimMatchResult,
} from "./types";

export type PlayMatchOptions = {
	seed: number;
	/** Player 1 always; player 2 as well for multiplayer matches. */
	players: Bot[];
	maxRounds: number;
	config?: MatchConfig;
	/** Resume from a saved state instead of starting fresh. */
	state?: MatchState;
	verbose?: boolean;
	record?: boolean;
};

export function playMatch(opts: PlayMatchOptions): SimMatchResult {
	const initialState =
		opts.state ?? (opts.config ? createMatchState(opts.config) : undefined);
	if (!initialState) {
		throw new Error("playMatch requires a config or a saved state.");
	}
	const { config } = initialState;
	const [p1, p2] = opts.players;
	if (!p1) throw new Error("playMatch requires a bot for player 1.");
	if (config.mode === "multiplayer" && !p2) {
		throw new Error("Multiplayer matches require two bots.");
	}

	const rng = mulberry32(opts.seed);
	const legal = legalMoves(config.ruleset);
	let state = initialState;
	let illegalMoves = 0;
	const moves: [Move, Move][] = [];
	const engineEvents: EngineEvent[] = [];

	const choose = (bot: Bot, seat: PlayerSlot): Move =>
		bot.chooseMove({
			ruleset: config.ruleset,
			legalMoves: legal,
			history: state.history,
			seat,
			rng,
		});

	const complete = (reason: MatchEndReason): SimMatchResult => {
		const outcome = checkMatchWinner(state);
		return {
			seed: opts.seed,
			rounds: state.history.length,
			winner:
				outcome === "player1"
					? config.player1
					: outcome === "player2"
						? config.player2
						: null,
			outcome: reason === "complete" ? outcome : null,
			scores: { ...state.scores },
			illegalMoves,
			reason,
			finalState: state,
			log: opts.record
				? {
						engineVersion: ENGINE_VERSION,
						seed: opts.seed,
						initialState,
						moves: [...moves],
						engineEvents: [...engineEvents],
						finalState: state,
					}
				: undefined,
		};
	};

	for (let i = 0; i < opts.maxRounds; i++) {
		if (state.phase === "match_complete") return complete("complete");

		let result: AdvanceRoundResult;
		if (config.mode === "single_player") {
			result = playComputerRound(state, choose(p1, "player1"), rng);
		} else if (p2) {
			result = advanceRound(
				state,
				choose(p1, "player1"),
				choose(p2, "player2"),
			);
		} else {
			throw new Error("Multiplayer matches require two bots.");
		}

		engineEvents.push(...result.engineEvents);
		if (!result.ok) {
			illegalMoves++;
			if (opts.verbose) {
				log("warn", "round rejected", {
					seed: opts.seed,
					round: state.round,
					reason: result.reason,
					error: result.error,
				});
			}
			return complete("illegal");
		}

		state = result.state;
		moves.push([result.record.move1, result.record.move2]);
		if (opts.verbose) {
			log("info", "round resolved", {
				seed: opts.seed,
				round: result.record.round,
				move1: result.record.move1,
				move2: result.record.move2,
				outcome: result.outcome,
				scores: state.scores,
			});
		}
	}

	return complete(state.phase === "match_complete" ? "complete" : "maxRounds");
}

export type ReplayInput = z.infer<typeof MatchLogSchema>;

/**
 * Re-resolve every recorded round from the log's initial state and compare
 * the engine events and final state with what was recorded.
 */
export function replayMatch(matchLog: MatchLog | ReplayInput): {
	ok: boolean;
	mismatchAt?: number;
	error?: string;
} {
	let state: MatchState = matchLog.initialState;
	const events: EngineEvent[] = [];

	for (let i = 0; i < matchLog.moves.length; i++) {
		const pair = matchLog.moves[i];
		if (!pair) break;
		const [move1, move2] = pair;
		if (state.config.mode === "single_player") {
			state = { ...state, humanRecent: pushRecent(state.humanRecent, move1) };
		}
		const result = advanceRound(state, move1, move2);
		events.push(...result.engineEvents);
		if (!result.ok) {
			return { ok: false, mismatchAt: i, error: result.error };
		}
		state = result.state;
	}

	if (safeJson(events) !== safeJson(matchLog.engineEvents)) {
		const mismatchAt = firstMismatchIndex(events, matchLog.engineEvents);
		return { ok: false, mismatchAt, error: "Engine events mismatch." };
	}

	if (matchLog.finalState && safeJson(state) !== safeJson(matchLog.finalState)) {
		return { ok: false, error: "Final state mismatch." };
	}

	return { ok: true };
}

function safeJson(x: unknown): string {
	try {
		return JSON.stringify(x);
	} catch {
		return String(x);
	}
}

function firstMismatchIndex(a: unknown[], b: unknown[]): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		if (safeJson(a[i]) !== safeJson(b[i])) return i;
	}
	return len;
}
