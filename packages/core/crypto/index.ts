export * from "./keyDerivation";
export * from "./cipher";
