import { pickOne } from "@rps-match/engine";
import type { Bot } from "../types";

export function makeRandomBot(id: string): Bot {
	return {
		id,
		name: "RandomBot",
		chooseMove: ({ legalMoves, rng }) => pickOne(legalMoves, rng),
	};
}
