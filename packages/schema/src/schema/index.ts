export * from "./primitives";
export * from "./catalog";
export * from "./save";
export * from "./format-zod-issues";
