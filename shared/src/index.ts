export * from "./types";
export * from "./errors";
export * from "./grid";
export * from "./validator";
export * from "./plan";
export * from "./integrity";
