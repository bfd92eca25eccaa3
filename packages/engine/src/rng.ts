import type { Rng } from "./types";

export function mulberry32(seed: number): Rng {
	let t = seed >>> 0;
	return function () {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

export function pickOne<T>(arr: readonly T[], rng: Rng): T {
	const idx = Math.floor(rng() * arr.length);
	const picked = arr[Math.min(idx, arr.length - 1)];
	if (picked === undefined) throw new Error("pickOne called with empty array");
	return picked;
}
