import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import {
	applyMatchResult,
	deserializeMatchState,
	deserializeScoreboard,
	emptyScoreboard,
	matchResult,
	rankScoreboard,
	type Scoreboard,
	serializeMatchState,
	serializeScoreboard,
} from "@rps-match/engine";
import minimist from "minimist";
import {
	type Args,
	botsFromArgs,
	type CliContext,
	configFromArgs,
	createCliContext,
} from "./context";
import { playMatch, replayMatch } from "./match";
import { log, setLogLevel } from "./obs/log";
import { runTournament } from "./tournament";
import { MatchLogSchema, type SimMatchResult } from "./types";

const STRING_FLAGS = [
	"mode",
	"p1",
	"p2",
	"ruleset",
	"format",
	"difficulty",
	"bot1",
	"bot2",
	"moves",
	"moves1",
	"moves2",
	"favorite",
	"favorite1",
	"favorite2",
	"save",
	"scoreboard",
	"stateFile",
	"logFile",
	"logLevel",
	"file",
	"sort",
];

function loadScoreboard(file: string): Scoreboard {
	if (!existsSync(file)) return emptyScoreboard();
	const decoded = deserializeScoreboard(readFileSync(file, "utf-8"));
	if (!decoded.ok) {
		log("warn", "scoreboard unreadable, starting from an empty one", {
			file,
			reason: decoded.reason,
			error: decoded.error,
		});
		return emptyScoreboard();
	}
	return decoded.value;
}

function recordOnScoreboard(file: string, result: SimMatchResult) {
	const summary = matchResult(result.finalState);
	if (!summary) return;
	const scoreboard = applyMatchResult(loadScoreboard(file), summary);
	writeFileSync(file, serializeScoreboard(scoreboard));
	log("info", "scoreboard updated", { file, winner: summary.winner });
}

function reportMatch(context: CliContext, result: SimMatchResult) {
	console.log(
		JSON.stringify(
			{
				seed: result.seed,
				rounds: result.rounds,
				reason: result.reason,
				winner: result.winner,
				scores: result.scores,
				illegalMoves: result.illegalMoves,
			},
			null,
			2,
		),
	);
	if (context.log && result.log) {
		console.log(JSON.stringify(result.log, null, 2));
	}
	if (context.logFile && result.log) {
		writeFileSync(context.logFile, JSON.stringify(result.log, null, 2));
		log("info", "match log written", { file: context.logFile });
	}
}

function handleSingleCommand(argv: Args, context: CliContext) {
	const config = configFromArgs(argv);
	const result = playMatch({
		seed: context.options.seed,
		config,
		players: botsFromArgs(argv, config),
		maxRounds: context.options.maxRounds,
		verbose: context.verbose,
		record: context.log || !!context.logFile,
	});
	reportMatch(context, result);

	if (context.saveFile) {
		if (result.reason === "complete") {
			log("info", "match complete, nothing to save", { file: context.saveFile });
		} else {
			writeFileSync(context.saveFile, serializeMatchState(result.finalState));
			log("info", "match saved", {
				file: context.saveFile,
				round: result.finalState.round,
			});
		}
	}
	if (context.scoreboardFile && result.reason === "complete") {
		recordOnScoreboard(context.scoreboardFile, result);
	}
}

function handleResumeCommand(argv: Args, context: CliContext) {
	const file = context.stateFile;
	if (!file) {
		throw new Error("Missing --stateFile for resume");
	}
	const decoded = deserializeMatchState(readFileSync(file, "utf-8"));
	if (!decoded.ok) {
		throw new Error(`${decoded.reason}: ${decoded.error}`);
	}
	const state = decoded.value;
	log("info", "match resumed", {
		file,
		round: state.round,
		phase: state.phase,
		scores: state.scores,
	});

	const result = playMatch({
		seed: context.options.seed,
		state,
		players: botsFromArgs(argv, state.config),
		maxRounds: context.options.maxRounds,
		verbose: context.verbose,
		record: context.log || !!context.logFile,
	});
	reportMatch(context, result);

	if (result.reason === "complete") {
		rmSync(file, { force: true });
		if (context.scoreboardFile) {
			recordOnScoreboard(context.scoreboardFile, result);
		}
	} else {
		writeFileSync(file, serializeMatchState(result.finalState));
	}
}

function handleReplayCommand(context: CliContext) {
	if (!context.logFile) {
		throw new Error("Missing --logFile for replay");
	}
	const raw: unknown = JSON.parse(readFileSync(context.logFile, "utf-8"));
	const parsed = MatchLogSchema.safeParse(raw);
	if (!parsed.success) {
		throw new Error(
			`Invalid match log: ${parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ")}`,
		);
	}
	const res = replayMatch(parsed.data);
	console.log(JSON.stringify(res, null, 2));
	if (!res.ok) process.exitCode = 1;
}

function handleTourneyCommand(argv: Args, context: CliContext) {
	const config = configFromArgs(argv);
	const { summary } = runTournament({
		games: context.options.games,
		seed: context.options.seed,
		maxRounds: context.options.maxRounds,
		config,
		players: botsFromArgs(argv, config),
	});
	console.log(
		JSON.stringify(
			{
				...summary,
				standings: rankScoreboard(summary.scoreboard, context.sort),
			},
			null,
			2,
		),
	);
}

function handleScoreboardCommand(context: CliContext) {
	if (!context.scoreboardFile) {
		throw new Error("Missing --file for scoreboard");
	}
	const rows = rankScoreboard(loadScoreboard(context.scoreboardFile), context.sort);
	if (context.json) {
		console.log(JSON.stringify(rows, null, 2));
		return;
	}
	if (rows.length === 0) {
		console.log("No matches recorded yet.");
		return;
	}
	for (const [i, row] of rows.entries()) {
		console.log(
			`${i + 1}. ${row.name}  played=${row.matchesPlayed} won=${row.matchesWon} rounds=${row.roundsWon} rate=${(row.winRate * 100).toFixed(1)}%`,
		);
	}
}

function printUsageAndExit(): never {
	console.error("Usage:");
	console.error(
		"  tsx src/cli.ts single     --seed 1 --ruleset extended --format bestof --count 5 --difficulty hard",
	);
	console.error(
		"  tsx src/cli.ts single     --mode multiplayer --bot1 scripted --moves r,p,s --bot2 cycle --save ./match.json",
	);
	console.error("  tsx src/cli.ts resume     --stateFile ./match.json --scoreboard ./scores.json");
	console.error("  tsx src/cli.ts single     --log --logFile ./log.json");
	console.error("  tsx src/cli.ts replay     --logFile ./log.json");
	console.error("  tsx src/cli.ts tourney    --games 200 --seed 1 --maxRounds 100");
	console.error("  tsx src/cli.ts scoreboard --file ./scores.json --sort win_rate");
	process.exit(1);
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		string: STRING_FLAGS,
		boolean: ["verbose", "log", "json"],
	});
	const cmd = argv._[0];
	const context = createCliContext(argv);
	setLogLevel(context.options.logLevel);

	switch (cmd) {
		case "single":
			handleSingleCommand(argv, context);
			return;
		case "resume":
			handleResumeCommand(argv, context);
			return;
		case "replay":
			handleReplayCommand(context);
			return;
		case "tourney":
			handleTourneyCommand(argv, context);
			return;
		case "scoreboard":
			handleScoreboardCommand(context);
			return;
		default:
			printUsageAndExit();
	}
}

main().catch((e: unknown) => {
	log("error", "command failed", {
		error: e instanceof Error ? e.message : String(e),
	});
	process.exit(1);
});
