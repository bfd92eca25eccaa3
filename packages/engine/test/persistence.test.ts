import { describe, expect, test } from "vitest";
import {
	advanceRound,
	beginNextRound,
	createMatchConfig,
	createMatchState,
	deserializeMatchConfig,
	deserializeMatchState,
	deserializeScoreboard,
	type MatchConfig,
	type MatchState,
	type Move,
	mulberry32,
	playComputerRound,
	serializeMatchConfig,
	serializeMatchState,
	serializeScoreboard,
} from "@rps-match/engine";

type SavedState = { version: number; data: MatchState };

function hardConfig(): MatchConfig {
	const result = createMatchConfig({
		player1: "Ada",
		mode: "single_player",
		ruleset: "extended",
		format: { type: "first_to", wins: 10 },
		difficulty: "hard",
	});
	if (!result.ok) throw new Error(result.error);
	return result.config;
}

function sevenRounds(): MatchState {
	const humanMoves: Move[] = [
		"rock",
		"spock",
		"rock",
		"lizard",
		"paper",
		"rock",
		"scissors",
	];
	const rng = mulberry32(99);
	let state = createMatchState(hardConfig());
	for (const move of humanMoves) {
		const result = playComputerRound(state, move, rng);
		if (!result.ok) throw new Error(result.error);
		state = result.state;
	}
	return state;
}

function tamper(state: MatchState, edit: (doc: SavedState) => void): string {
	const doc: SavedState = JSON.parse(serializeMatchState(state));
	edit(doc);
	return JSON.stringify(doc);
}

describe("match state persistence", () => {
	test("round-trips a seven round match exactly", () => {
		const state = sevenRounds();
		expect(state.history).toHaveLength(7);
		const decoded = deserializeMatchState(serializeMatchState(state));
		expect(decoded).toEqual({ ok: true, value: state });
	});

	test("round-trips a state awaiting its next round", () => {
		const state = beginNextRound(sevenRounds());
		expect(state.round).toBe(8);
		const decoded = deserializeMatchState(serializeMatchState(state));
		expect(decoded.ok && decoded.value).toEqual(state);
	});

	test("round-trips a fresh multiplayer match", () => {
		const config = createMatchConfig({
			player1: "Ada",
			player2: "Bo",
			mode: "multiplayer",
			format: { type: "best_of", rounds: 3 },
		});
		if (!config.ok) throw new Error(config.error);
		const state = createMatchState(config.config);
		const decoded = deserializeMatchState(serializeMatchState(state));
		expect(decoded.ok && decoded.value).toEqual(state);
	});

	test("writes a versioned envelope", () => {
		const doc: SavedState = JSON.parse(serializeMatchState(sevenRounds()));
		expect(doc.version).toBe(1);
		expect(doc.data.history).toHaveLength(7);
	});

	test("invalid JSON is malformed", () => {
		expect(deserializeMatchState("{not json")).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "Saved game is not valid JSON.",
		});
	});

	test("unknown versions are malformed", () => {
		const raw = tamper(sevenRounds(), (doc) => {
			doc.version = 2;
		});
		const decoded = deserializeMatchState(raw);
		expect(decoded.ok).toBe(false);
		if (decoded.ok) return;
		expect(decoded.reason).toBe("malformed_persisted_state");
	});

	test("missing fields are malformed", () => {
		const decoded = deserializeMatchState(
			JSON.stringify({ version: 1, data: { round: 1 } }),
		);
		expect(decoded.ok).toBe(false);
	});

	test("scores that disagree with history are malformed", () => {
		const raw = tamper(sevenRounds(), (doc) => {
			doc.data.scores.player1 += 1;
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "scores do not match history",
		});
	});

	test("a round index out of step with history is malformed", () => {
		const raw = tamper(sevenRounds(), (doc) => {
			doc.data.round = 3;
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "round must be 7 in phase round_resolved",
		});
	});

	test("moves outside the ruleset are malformed", () => {
		const config = createMatchConfig({
			player1: "Ada",
			player2: "Bo",
			mode: "multiplayer",
			format: { type: "first_to", wins: 3 },
		});
		if (!config.ok) throw new Error(config.error);
		const played = advanceRound(createMatchState(config.config), "rock", "paper");
		if (!played.ok) throw new Error(played.error);
		const raw = tamper(played.state, (doc) => {
			doc.data.history = [
				{ round: 1, move1: "spock", move2: "paper", outcome: "player2" },
			];
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error:
				"history[0] contains a move outside the classic ruleset; scores do not match history",
		});
	});

	test("rounds played after a decided single round are malformed", () => {
		const config = createMatchConfig({
			player1: "Ada",
			player2: "Bo",
			mode: "multiplayer",
		});
		if (!config.ok) throw new Error(config.error);
		const played = advanceRound(createMatchState(config.config), "rock", "scissors");
		if (!played.ok) throw new Error(played.error);
		expect(played.state.phase).toBe("match_complete");
		const raw = tamper(played.state, (doc) => {
			doc.data.history.push({
				round: 2,
				move1: "rock",
				move2: "scissors",
				outcome: "player1",
			});
			doc.data.scores.player1 = 2;
			doc.data.round = 2;
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "history[1] was played after the match was decided",
		});
	});

	test("a best-of history that runs past its decider is malformed", () => {
		const config = createMatchConfig({
			player1: "Ada",
			player2: "Bo",
			mode: "multiplayer",
			format: { type: "best_of", rounds: 3 },
		});
		if (!config.ok) throw new Error(config.error);
		let state = createMatchState(config.config);
		for (let i = 0; i < 2; i++) {
			const played = advanceRound(state, "paper", "rock");
			if (!played.ok) throw new Error(played.error);
			state = played.state;
		}
		expect(state.phase).toBe("match_complete");
		const raw = tamper(state, (doc) => {
			doc.data.history.push({
				round: 3,
				move1: "paper",
				move2: "rock",
				outcome: "player1",
			});
			doc.data.scores.player1 = 3;
			doc.data.round = 3;
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "history[2] was played after the match was decided",
		});
	});

	test("an overfull recent buffer is malformed", () => {
		const raw = tamper(sevenRounds(), (doc) => {
			doc.data.humanRecent = Array.from({ length: 13 }, () => "rock" as const);
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "humanRecent holds more than 12 moves",
		});
	});

	test("an even best-of in a saved config is malformed", () => {
		const raw = tamper(sevenRounds(), (doc) => {
			doc.data.config.format = { type: "best_of", rounds: 4 };
		});
		expect(deserializeMatchState(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "config: best_of rounds must be odd (got 4)",
		});
	});
});

describe("config and scoreboard persistence", () => {
	test("config round-trip", () => {
		const config = hardConfig();
		expect(deserializeMatchConfig(serializeMatchConfig(config))).toEqual({
			ok: true,
			value: config,
		});
	});

	test("config with a multiplayer difficulty is malformed", () => {
		const decoded = deserializeMatchConfig(
			JSON.stringify({
				version: 1,
				data: {
					mode: "multiplayer",
					player1: "Ada",
					player2: "Bo",
					ruleset: "classic",
					format: { type: "single_round" },
					difficulty: "hard",
				},
			}),
		);
		expect(decoded.ok).toBe(false);
	});

	test("scoreboard round-trip", () => {
		const scoreboard = {
			players: {
				Ada: { matchesPlayed: 3, matchesWon: 2, roundsWon: 7 },
				Computer: { matchesPlayed: 3, matchesWon: 1, roundsWon: 5 },
			},
		};
		expect(deserializeScoreboard(serializeScoreboard(scoreboard))).toEqual({
			ok: true,
			value: scoreboard,
		});
	});

	test("scoreboard with more wins than matches is malformed", () => {
		const raw = serializeScoreboard({
			players: { Ada: { matchesPlayed: 1, matchesWon: 2, roundsWon: 0 } },
		});
		expect(deserializeScoreboard(raw)).toEqual({
			ok: false,
			reason: "malformed_persisted_state",
			error: "players.Ada: matchesWon exceeds matchesPlayed",
		});
	});

	test("scoreboard with negative counts is malformed", () => {
		const decoded = deserializeScoreboard(
			JSON.stringify({
				version: 1,
				data: { players: { Ada: { matchesPlayed: -1, matchesWon: 0, roundsWon: 0 } } },
			}),
		);
		expect(decoded.ok).toBe(false);
	});
});
