export * from "./corpusStats";
