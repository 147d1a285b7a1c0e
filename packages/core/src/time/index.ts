export * from "./constants";
export * from "./time";
