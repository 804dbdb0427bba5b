export * from "./searchEngine";
