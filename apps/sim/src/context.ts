import {
	createMatchConfig,
	DifficultySchema,
	type MatchConfig,
	type MatchFormat,
	type Move,
	parseMove,
	type Ruleset,
	RulesetSchema,
	type ScoreboardSort,
} from "@rps-match/engine";
import type minimist from "minimist";
import { z } from "zod";
import { makeCycleBot } from "./bots/cycleBot";
import { makeRandomBot } from "./bots/randomBot";
import { makeScriptedBot } from "./bots/scriptedBot";
import { makeStickyBot } from "./bots/stickyBot";
import { getLogLevel, isLogLevel, type LogLevel } from "./obs/log";
import { createSimulationOptions, type SimulationOptions } from "./simulation/config";
import type { Bot } from "./types";

export type Args = ReturnType<typeof minimist>;

const BotTypeSchema = z.enum(["random", "sticky", "cycle", "scripted"]);
export type BotType = z.infer<typeof BotTypeSchema>;

const ModeSchema = z.enum(["single_player", "multiplayer"]);
const FormatArgSchema = z.enum(["single", "bestof", "firstto"]);
const SortSchema = z.enum(["matches_won", "win_rate", "rounds_won"]);

export type CliContext = {
	verbose: boolean;
	log: boolean;
	json: boolean;
	logFile?: string;
	saveFile?: string;
	stateFile?: string;
	scoreboardFile?: string;
	sort: ScoreboardSort;
	options: SimulationOptions;
};

export function stringArg(argv: Args, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = argv[key];
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
}

export function num(v: unknown, def: number) {
	const n =
		typeof v === "string" ? Number(v) : typeof v === "number" ? v : Number.NaN;
	return Number.isFinite(n) ? n : def;
}

function enumArg<T extends [string, ...string[]]>(
	schema: z.ZodEnum<T>,
	flag: string,
	value: unknown,
	fallback: T[number],
): T[number] {
	if (value === undefined) return fallback;
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		throw new Error(
			`Invalid --${flag} "${String(value)}" (expected ${schema.options.join(", ")})`,
		);
	}
	return parsed.data;
}

export function parseFormatArg(argv: Args): MatchFormat {
	const kind = enumArg(FormatArgSchema, "format", argv.format, "single");
	const count = num(argv.count, 3);
	switch (kind) {
		case "single":
			return { type: "single_round" };
		case "bestof":
			return { type: "best_of", rounds: count };
		case "firstto":
			return { type: "first_to", wins: count };
	}
}

export function configFromArgs(argv: Args): MatchConfig {
	const mode = enumArg(ModeSchema, "mode", argv.mode, "single_player");
	const result = createMatchConfig({
		mode,
		player1: stringArg(argv, "p1") ?? "Player 1",
		player2:
			stringArg(argv, "p2") ?? (mode === "multiplayer" ? "Player 2" : undefined),
		ruleset: enumArg(RulesetSchema, "ruleset", argv.ruleset, "classic"),
		format: parseFormatArg(argv),
		difficulty:
			mode === "single_player"
				? enumArg(DifficultySchema, "difficulty", argv.difficulty, "normal")
				: undefined,
	});
	if (!result.ok) {
		throw new Error(`${result.reason}: ${result.error}`);
	}
	return result.config;
}

export function parseScript(raw: string, ruleset: Ruleset): Move[] {
	return raw
		.split(",")
		.filter((part) => part.trim().length > 0)
		.map((part) => {
			const move = parseMove(part, ruleset);
			if (!move) {
				throw new Error(
					`Invalid move "${part.trim()}" in --moves for the ${ruleset} ruleset`,
				);
			}
			return move;
		});
}

export function makeBot(
	id: string,
	type: BotType,
	opts: { ruleset: Ruleset; moves?: string; favorite?: string },
): Bot {
	switch (type) {
		case "sticky": {
			const favorite = parseMove(opts.favorite ?? "rock", opts.ruleset);
			if (!favorite) {
				throw new Error(`Invalid --favorite for the ${opts.ruleset} ruleset`);
			}
			return makeStickyBot(id, favorite);
		}
		case "cycle":
			return makeCycleBot(id);
		case "scripted": {
			if (!opts.moves) {
				throw new Error(`Missing --moves for ${id} (required for scripted bot)`);
			}
			return makeScriptedBot(id, parseScript(opts.moves, opts.ruleset));
		}
		default:
			return makeRandomBot(id);
	}
}

export function botsFromArgs(argv: Args, config: MatchConfig): Bot[] {
	const bot1 = makeBot("P1", enumArg(BotTypeSchema, "bot1", argv.bot1, "random"), {
		ruleset: config.ruleset,
		moves: stringArg(argv, "moves1", "moves"),
		favorite: stringArg(argv, "favorite1", "favorite"),
	});
	if (config.mode === "single_player") return [bot1];
	const bot2 = makeBot("P2", enumArg(BotTypeSchema, "bot2", argv.bot2, "random"), {
		ruleset: config.ruleset,
		moves: stringArg(argv, "moves2"),
		favorite: stringArg(argv, "favorite2"),
	});
	return [bot1, bot2];
}

export function createCliContext(argv: Args): CliContext {
	const logLevelArg = stringArg(argv, "logLevel");
	let logLevel: LogLevel = getLogLevel();
	if (logLevelArg !== undefined) {
		if (!isLogLevel(logLevelArg)) {
			throw new Error(`Invalid --logLevel "${logLevelArg}"`);
		}
		logLevel = logLevelArg;
	}

	const options = createSimulationOptions({
		seed: num(argv.seed, 1),
		games: num(argv.games, 200),
		maxRounds: num(argv.maxRounds, 100),
		logLevel,
	});

	return {
		verbose: !!argv.verbose,
		log: !!argv.log,
		json: !!argv.json,
		logFile: stringArg(argv, "logFile"),
		saveFile: stringArg(argv, "save"),
		stateFile: stringArg(argv, "stateFile"),
		scoreboardFile:
			argv._[0] === "scoreboard"
				? stringArg(argv, "file", "scoreboard")
				: stringArg(argv, "scoreboard"),
		sort: enumArg(SortSchema, "sort", argv.sort, "matches_won"),
		options,
	};
}
