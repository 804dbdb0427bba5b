export * from "./chatContext";
