/**
 * Central type exports
 */

export * from "./logger";
export * from "./ordering";
export * from "./compare";
export * from "./iter";
export * from "./transliteration";
export * from "./cli";
