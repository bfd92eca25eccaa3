import {
	applyMatchResult,
	emptyScoreboard,
	type MatchConfig,
	matchResult,
	type Scoreboard,
} from "@rps-match/engine";
import { playMatch } from "./match";
import type { Bot, SimMatchResult } from "./types";

export type TournamentSummary = {
	games: number;
	seed: number;
	maxRounds: number;
	wins: Record<string, number>;
	ties: number;
	unfinished: number;
	illegal: number;
	avgRounds: number;
	scoreboard: Scoreboard;
};

export function runTournament(opts: {
	games: number;
	seed: number;
	maxRounds: number;
	config: MatchConfig;
	players: Bot[];
}): { summary: TournamentSummary; results: SimMatchResult[] } {
	const results: SimMatchResult[] = [];
	for (let i = 0; i < opts.games; i++) {
		const matchSeed = (opts.seed + i) >>> 0;
		results.push(
			playMatch({
				seed: matchSeed,
				config: opts.config,
				players: opts.players,
				maxRounds: opts.maxRounds,
			}),
		);
	}

	const wins = new Map<string, number>();
	let ties = 0;
	let unfinished = 0;
	let illegal = 0;
	let totalRounds = 0;
	let scoreboard = emptyScoreboard();

	for (const r of results) {
		totalRounds += r.rounds;
		if (r.reason === "maxRounds") unfinished++;
		else if (r.reason === "illegal") illegal++;
		else if (r.winner == null) ties++;
		else wins.set(r.winner, (wins.get(r.winner) ?? 0) + 1);

		const merge = matchResult(r.finalState);
		if (merge) scoreboard = applyMatchResult(scoreboard, merge);
	}

	const summary: TournamentSummary = {
		games: opts.games,
		seed: opts.seed,
		maxRounds: opts.maxRounds,
		wins: Object.fromEntries(wins),
		ties,
		unfinished,
		illegal,
		avgRounds: Number((totalRounds / Math.max(1, opts.games)).toFixed(2)),
		scoreboard,
	};

	return { summary, results };
}
