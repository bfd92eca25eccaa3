export * from "./config";
export * from "./match";
export * from "./moveInput";
export * from "./opponent";
export * from "./persistence";
export * from "./rng";
export * from "./rules";
export * from "./scoreboard";
export * from "./types";

export const ENGINE_VERSION = "rpsls_match_v1" as const;
