import type { Bot } from "../types";

export function makeCycleBot(id: string): Bot {
	return {
		id,
		name: "CycleBot",
		chooseMove: ({ legalMoves, history }) => {
			const move = legalMoves[history.length % legalMoves.length];
			if (move === undefined) throw new Error("CycleBot has no legal moves");
			return move;
		},
	};
}
