import minimist from "minimist";
import { describe, expect, test } from "vitest";
import {
	configFromArgs,
	createCliContext,
	makeBot,
	parseFormatArg,
	parseScript,
} from "../src/context";

const args = (...argv: string[]) => minimist(argv, { string: ["p1", "p2", "moves"] });

describe("cli context", () => {
	test("defaults to a single-round single-player match", () => {
		expect(configFromArgs(args("single"))).toEqual({
			mode: "single_player",
			player1: "Player 1",
			player2: "Computer",
			ruleset: "classic",
			format: { type: "single_round" },
			difficulty: "normal",
		});
	});

	test("builds a multiplayer config with default names", () => {
		const config = configFromArgs(
			args("single", "--mode", "multiplayer", "--ruleset", "extended"),
		);
		expect(config.mode).toBe("multiplayer");
		expect(config.player2).toBe("Player 2");
		expect(config.ruleset).toBe("extended");
	});

	test("maps format flags to match formats", () => {
		expect(parseFormatArg(args("--format", "bestof", "--count", "5"))).toEqual({
			type: "best_of",
			rounds: 5,
		});
		expect(parseFormatArg(args("--format", "firstto"))).toEqual({
			type: "first_to",
			wins: 3,
		});
	});

	test("surfaces config rejections with their reason", () => {
		expect(() =>
			configFromArgs(args("--format", "bestof", "--count", "4")),
		).toThrow("invalid_format_parameter: best_of rounds must be odd (got 4)");
		expect(() =>
			configFromArgs(args("--mode", "multiplayer", "--p1", "Ada", "--p2", "Ada")),
		).toThrow("invalid_config: player names must be different");
	});

	test("rejects unknown enum flags", () => {
		expect(() => configFromArgs(args("--ruleset", "chess"))).toThrow(
			'Invalid --ruleset "chess" (expected classic, extended)',
		);
	});

	test("parses scripted moves with aliases", () => {
		expect(parseScript("r, P ,scissors", "classic")).toEqual([
			"rock",
			"paper",
			"scissors",
		]);
		expect(() => parseScript("r,k", "classic")).toThrow(
			'Invalid move "k" in --moves for the classic ruleset',
		);
	});

	test("scripted bots need --moves", () => {
		expect(() => makeBot("P1", "scripted", { ruleset: "classic" })).toThrow(
			"Missing --moves for P1 (required for scripted bot)",
		);
	});

	test("collects simulation options and file flags", () => {
		const context = createCliContext(
			args("tourney", "--games", "12", "--seed", "9", "--sort", "win_rate"),
		);
		expect(context.options.games).toBe(12);
		expect(context.options.seed).toBe(9);
		expect(context.options.maxRounds).toBe(100);
		expect(context.sort).toBe("win_rate");
		expect(context.scoreboardFile).toBeUndefined();
	});

	test("--file names the scoreboard only for the scoreboard command", () => {
		expect(
			createCliContext(args("single", "--file", "scores.json")).scoreboardFile,
		).toBeUndefined();
		expect(
			createCliContext(args("single", "--scoreboard", "scores.json")).scoreboardFile,
		).toBe("scores.json");
		expect(
			createCliContext(args("scoreboard", "--file", "scores.json")).scoreboardFile,
		).toBe("scores.json");
	});
});
