import type { MatchResult, PlayerStats, Scoreboard } from "./types";

export type ScoreboardSort = "matches_won" | "win_rate" | "rounds_won";

export type ScoreboardRow = PlayerStats & {
	name: string;
	winRate: number;
};

const EMPTY_STATS: PlayerStats = {
	matchesPlayed: 0,
	matchesWon: 0,
	roundsWon: 0,
};

export function emptyScoreboard(): Scoreboard {
	return { players: {} };
}

export function ensurePlayer(scoreboard: Scoreboard, name: string): Scoreboard {
	if (Object.hasOwn(scoreboard.players, name)) return scoreboard;
	return { players: { ...scoreboard.players, [name]: { ...EMPTY_STATS } } };
}

export function applyMatchResult(
	scoreboard: Scoreboard,
	result: MatchResult,
): Scoreboard {
	// Keyed by player name, so no name may reach the object's prototype.
	const players = new Map(Object.entries(scoreboard.players));
	const bump = (name: string, rounds: number, won: boolean) => {
		const current = players.get(name) ?? EMPTY_STATS;
		players.set(name, {
			matchesPlayed: current.matchesPlayed + 1,
			matchesWon: current.matchesWon + (won ? 1 : 0),
			roundsWon: current.roundsWon + rounds,
		});
	};
	bump(result.player1, result.player1Rounds, result.winner === result.player1);
	bump(result.player2, result.player2Rounds, result.winner === result.player2);
	return { players: Object.fromEntries(players) };
}

export function winRate(stats: PlayerStats): number {
	return stats.matchesPlayed === 0 ? 0 : stats.matchesWon / stats.matchesPlayed;
}

export function rankScoreboard(
	scoreboard: Scoreboard,
	sortBy: ScoreboardSort,
): ScoreboardRow[] {
	const rows: ScoreboardRow[] = Object.entries(scoreboard.players).map(
		([name, stats]) => ({ name, ...stats, winRate: winRate(stats) }),
	);
	const key = (row: ScoreboardRow): number => {
		switch (sortBy) {
			case "matches_won":
				return row.matchesWon;
			case "win_rate":
				return row.winRate;
			case "rounds_won":
				return row.roundsWon;
		}
	};
	return rows.sort((a, b) => key(b) - key(a) || a.name.localeCompare(b.name));
}
