export * from "./loader";
export * from "./table";
