export * from "./behavior";
export * from "./rules";
export * from "./snapshot";
