export * from "./documentRegistry";
