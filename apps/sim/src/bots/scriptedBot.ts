import type { Bot, Move } from "../types";

/** Replays a fixed move list, wrapping around when it runs out. */
export function makeScriptedBot(id: string, script: readonly Move[]): Bot {
	if (script.length === 0) {
		throw new Error("makeScriptedBot requires at least one move");
	}
	return {
		id,
		name: "ScriptedBot",
		chooseMove: ({ history }) => {
			const move = script[history.length % script.length];
			if (move === undefined) throw new Error("ScriptedBot ran out of moves");
			return move;
		},
	};
}
