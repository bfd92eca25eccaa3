import { pickOne } from "@rps-match/engine";
import type { Bot, Move } from "../types";

/**
 * Plays a favourite move most of the time. A predictable human; the hard
 * computer tier should beat it consistently.
 */
export function makeStickyBot(id: string, favorite: Move, loyalty = 0.8): Bot {
	return {
		id,
		name: "StickyBot",
		chooseMove: ({ legalMoves, rng }) => {
			if (legalMoves.includes(favorite) && rng() < loyalty) return favorite;
			return pickOne(legalMoves, rng);
		},
	};
}
