import {
	ENGINE_VERSION,
	type EngineEvent,
	type MatchState,
	MatchStateSchema,
	type Move,
	MoveSchema,
	type PlayerSlot,
	type Rng,
	type RoundOutcome,
	type RoundRecord,
	type Ruleset,
} from "@rps-match/engine";
import { z } from "zod";

export type {
	EngineEvent,
	MatchState,
	Move,
	PlayerSlot,
	RoundOutcome,
} from "@rps-match/engine";

export type MatchEndReason = "complete" | "maxRounds" | "illegal";

export type SimMatchResult = {
	seed: number;
	rounds: number;
	winner: string | null;
	outcome: RoundOutcome | null;
	scores: Record<PlayerSlot, number>;
	illegalMoves: number;
	reason: MatchEndReason;
	finalState: MatchState;
	log?: MatchLog;
};

export type MatchLog = {
	engineVersion: typeof ENGINE_VERSION;
	seed: number;
	initialState: MatchState;
	moves: [Move, Move][];
	engineEvents: EngineEvent[];
	finalState?: MatchState;
};

export const MatchLogSchema = z.object({
	engineVersion: z.literal(ENGINE_VERSION),
	seed: z.number().int(),
	initialState: MatchStateSchema,
	moves: z.array(z.tuple([MoveSchema, MoveSchema])),
	engineEvents: z.array(z.unknown()),
	finalState: MatchStateSchema.optional(),
});

/** A scripted stand-in for a human at one seat. */
export type Bot = {
	id: string;
	name: string;
	chooseMove: (ctx: {
		ruleset: Ruleset;
		legalMoves: readonly Move[];
		history: readonly RoundRecord[];
		seat: PlayerSlot;
		rng: Rng;
	}) => Move;
};
