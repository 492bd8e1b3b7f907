export * from "./comparators";
export * from "./lexical";
export * from "./natural";
export * from "./tieBreak";
