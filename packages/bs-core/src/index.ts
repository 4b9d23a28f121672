export * from "./blackScholes";
export * from "./constants";
export * from "./errors";
export * from "./grid";
export * from "./normal";
export * from "./units";
export * from "./utils";
export * from "./variant";
