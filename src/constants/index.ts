/**
 * Central constants exports
 */

export * from "./logger";
export * from "./ordering";
export * from "./compare";
export * from "./transliteration";
export * from "./cli";
