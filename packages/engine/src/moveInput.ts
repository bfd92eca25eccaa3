import { isLegalMove } from "./rules";
import type { Move, Ruleset } from "./types";

const ALIASES: Record<string, Move> = {
	rock: "rock",
	r: "rock",
	paper: "paper",
	p: "paper",
	scissors: "scissors",
	s: "scissors",
	lizard: "lizard",
	l: "lizard",
	spock: "spock",
	k: "spock",
};

/** Parse typed input such as "Rock" or "k"; `null` when not legal for the ruleset. */
export function parseMove(input: string, ruleset: Ruleset): Move | null {
	const move = ALIASES[input.trim().toLowerCase()];
	if (move === undefined || !isLegalMove(ruleset, move)) return null;
	return move;
}

export function acceptedInputs(ruleset: Ruleset): string {
	return ruleset === "classic"
		? "rock / paper / scissors  OR  r / p / s"
		: "rock / paper / scissors / lizard / spock  OR  r / p / s / l / k";
}
