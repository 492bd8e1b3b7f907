export * from "./stringSort";
export * from "./sortKey";
