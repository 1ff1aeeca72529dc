export * from "./card";
export * from "./hand";
export * from "./joker";
export * from "./effect";
export * from "./save";
