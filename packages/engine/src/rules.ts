import type { Move, RoundOutcome, Ruleset } from "./types";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const CLASSIC_MOVES: readonly Move[] = ["rock", "paper", "scissors"];
const EXTENDED_MOVES: readonly Move[] = [
	"rock",
	"paper",
	"scissors",
	"lizard",
	"spock",
];

// Each entry lists the moves the key defeats.
const CLASSIC_BEATS: Readonly<Partial<Record<Move, readonly Move[]>>> = {
	rock: ["scissors"],
	paper: ["rock"],
	scissors: ["paper"],
};

const EXTENDED_BEATS: Readonly<Record<Move, readonly Move[]>> = {
	rock: ["scissors", "lizard"],
	paper: ["rock", "spock"],
	scissors: ["paper", "lizard"],
	lizard: ["spock", "paper"],
	spock: ["scissors", "rock"],
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function legalMoves(ruleset: Ruleset): readonly Move[] {
	return ruleset === "classic" ? CLASSIC_MOVES : EXTENDED_MOVES;
}

export function isLegalMove(ruleset: Ruleset, move: unknown): move is Move {
	return legalMoves(ruleset).some((m) => m === move);
}

export function beats(ruleset: Ruleset, a: Move, b: Move): boolean {
	const table = ruleset === "classic" ? CLASSIC_BEATS : EXTENDED_BEATS;
	return table[a]?.includes(b) ?? false;
}

export function resolveRound(
	ruleset: Ruleset,
	moveA: Move,
	moveB: Move,
): RoundOutcome {
	if (moveA === moveB) return "tie";
	return beats(ruleset, moveA, moveB) ? "player1" : "player2";
}

/** Legal moves that defeat `target`, in canonical order. */
export function winningMovesAgainst(ruleset: Ruleset, target: Move): Move[] {
	return legalMoves(ruleset).filter((m) => beats(ruleset, m, target));
}
