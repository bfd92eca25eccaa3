import { pickOne } from "./rng";
import { legalMoves, winningMovesAgainst } from "./rules";
import type { Difficulty, Move, Rng, Ruleset } from "./types";

export const HUMAN_RECENT_CAPACITY = 12;

// Share of Normal-tier rounds that are played purely at random.
export const NORMAL_RANDOM_RATE = 0.65;

export type OpponentContext = {
	ruleset: Ruleset;
	difficulty: Difficulty;
	/** Most recent human moves, oldest first, including `humanMove`. */
	humanRecent: readonly Move[];
	humanMove: Move;
	rng: Rng;
};

export function pushRecent(
	buffer: readonly Move[],
	move: Move,
	capacity = HUMAN_RECENT_CAPACITY,
): Move[] {
	const next = [...buffer, move];
	return next.length > capacity ? next.slice(next.length - capacity) : next;
}

/**
 * Most frequent move in `moves`. Ties are broken with a pick among the
 * maximal moves (ordered by first appearance); `null` for an empty list.
 */
export function mostFrequentMove(
	moves: readonly Move[],
	rng: Rng,
): Move | null {
	const counts = new Map<Move, number>();
	for (const m of moves) {
		counts.set(m, (counts.get(m) ?? 0) + 1);
	}
	let best = 0;
	let leaders: Move[] = [];
	for (const [move, count] of counts) {
		if (count > best) {
			best = count;
			leaders = [move];
		} else if (count === best) {
			leaders.push(move);
		}
	}
	if (leaders.length === 0) return null;
	if (leaders.length === 1) return leaders[0] ?? null;
	return pickOne(leaders, rng);
}

export function bestCounter(ruleset: Ruleset, target: Move, rng: Rng): Move {
	const candidates = winningMovesAgainst(ruleset, target);
	if (candidates.length === 0) return target;
	return pickOne(candidates, rng);
}

export function chooseComputerMove(ctx: OpponentContext): Move {
	const { ruleset, rng } = ctx;
	switch (ctx.difficulty) {
		case "easy":
			return pickOne(legalMoves(ruleset), rng);
		case "normal":
			if (rng() < NORMAL_RANDOM_RATE) {
				return pickOne(legalMoves(ruleset), rng);
			}
			return bestCounter(ruleset, ctx.humanMove, rng);
		case "hard": {
			const predicted = mostFrequentMove(ctx.humanRecent, rng) ?? ctx.humanMove;
			return bestCounter(ruleset, predicted, rng);
		}
	}
}
