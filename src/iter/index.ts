export * from "./transliterate";
export * from "./peekable";
