export * from "./insightGenerator";
export * from "./openaiTextGenerator";
export * from "./prompt";
export * from "./types";
