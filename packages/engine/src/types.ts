import { z } from "zod";

// Rock-Paper-Scissors(-Lizard-Spock) match engine types

export type Move = "rock" | "paper" | "scissors" | "lizard" | "spock";
export type Ruleset = "classic" | "extended";
export type Difficulty = "easy" | "normal" | "hard";
export type Mode = "single_player" | "multiplayer";
export type RoundOutcome = "player1" | "player2" | "tie";
export type PlayerSlot = "player1" | "player2";

export type MatchFormat =
	| { type: "single_round" }
	| { type: "best_of"; rounds: number }
	| { type: "first_to"; wins: number };

type MatchConfigBase = {
	player1: string;
	player2: string;
	ruleset: Ruleset;
	format: MatchFormat;
};

export type MatchConfig =
	| (MatchConfigBase & { mode: "single_player"; difficulty: Difficulty })
	| (MatchConfigBase & { mode: "multiplayer"; difficulty?: undefined });

export type RoundRecord = {
	readonly round: number;
	readonly move1: Move;
	readonly move2: Move;
	readonly outcome: RoundOutcome;
};

export type MatchPhase = "awaiting_round" | "round_resolved" | "match_complete";

export type MatchState = {
	config: MatchConfig;
	round: number;
	phase: MatchPhase;
	scores: Record<PlayerSlot, number>;
	history: RoundRecord[];
	humanRecent: Move[];
};

export type Rng = () => number;

export type RejectionReason =
	| "invalid_move"
	| "terminal"
	| "wrong_mode"
	| "invalid_format_parameter"
	| "invalid_config"
	| "malformed_persisted_state";

export type EngineEvent =
	| {
			type: "round_resolved";
			round: number;
			move1: Move;
			move2: Move;
			outcome: RoundOutcome;
			scores: Record<PlayerSlot, number>;
	  }
	| {
			type: "match_ended";
			round: number;
			winner: RoundOutcome;
			scores: Record<PlayerSlot, number>;
	  }
	| {
			type: "reject";
			round: number;
			move1: string;
			move2: string;
			reason: RejectionReason;
	  };

export type AdvanceRoundResult =
	| {
			ok: true;
			state: MatchState;
			outcome: RoundOutcome;
			record: RoundRecord;
			engineEvents: EngineEvent[];
	  }
	| {
			ok: false;
			state: MatchState;
			engineEvents: EngineEvent[];
			reason: "invalid_move" | "terminal" | "wrong_mode";
			error: string;
	  };

export type PlayerStats = {
	matchesPlayed: number;
	matchesWon: number;
	roundsWon: number;
};

export type Scoreboard = {
	players: Record<string, PlayerStats>;
};

/** Arguments for merging a finished match into a scoreboard ledger. */
export type MatchResult = {
	player1: string;
	player2: string;
	winner: string | null;
	player1Rounds: number;
	player2Rounds: number;
};

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const MoveSchema = z.enum(["rock", "paper", "scissors", "lizard", "spock"]);
export const RulesetSchema = z.enum(["classic", "extended"]);
export const DifficultySchema = z.enum(["easy", "normal", "hard"]);
export const RoundOutcomeSchema = z.enum(["player1", "player2", "tie"]);

export const MatchFormatSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("single_round") }).strict(),
	z
		.object({
			type: z.literal("best_of"),
			rounds: z.number().int("rounds must be an integer"),
		})
		.strict(),
	z
		.object({
			type: z.literal("first_to"),
			wins: z.number().int("wins must be an integer"),
		})
		.strict(),
]);

// "__proto__" cannot survive as a key of a parsed scoreboard record.
const PlayerNameSchema = z
	.string()
	.trim()
	.min(1, "player name cannot be empty")
	.refine((name) => name !== "__proto__", "player name is reserved");

export const MatchConfigSchema = z.discriminatedUnion("mode", [
	z
		.object({
			mode: z.literal("single_player"),
			player1: PlayerNameSchema,
			player2: PlayerNameSchema,
			ruleset: RulesetSchema,
			format: MatchFormatSchema,
			difficulty: DifficultySchema,
		})
		.strict(),
	z
		.object({
			mode: z.literal("multiplayer"),
			player1: PlayerNameSchema,
			player2: PlayerNameSchema,
			ruleset: RulesetSchema,
			format: MatchFormatSchema,
			difficulty: z.undefined().optional(),
		})
		.strict(),
]);

export const RoundRecordSchema = z
	.object({
		round: z.number().int().positive(),
		move1: MoveSchema,
		move2: MoveSchema,
		outcome: RoundOutcomeSchema,
	})
	.strict();

export const MatchStateSchema = z
	.object({
		config: MatchConfigSchema,
		round: z.number().int().positive(),
		phase: z.enum(["awaiting_round", "round_resolved", "match_complete"]),
		scores: z
			.object({
				player1: z.number().int().nonnegative(),
				player2: z.number().int().nonnegative(),
			})
			.strict(),
		history: z.array(RoundRecordSchema),
		humanRecent: z.array(MoveSchema),
	})
	.strict();

export const PlayerStatsSchema = z
	.object({
		matchesPlayed: z.number().int().nonnegative(),
		matchesWon: z.number().int().nonnegative(),
		roundsWon: z.number().int().nonnegative(),
	})
	.strict();

export const ScoreboardSchema = z
	.object({
		players: z.record(z.string(), PlayerStatsSchema),
	})
	.strict();
