export * from "./options";
export * from "./sortLines";
