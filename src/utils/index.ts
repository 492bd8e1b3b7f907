/**
 * Utils barrel exports
 */

export * from "./text/charClass";
export * from "./text/codePoints";
export * from "./transliterationValidation";
