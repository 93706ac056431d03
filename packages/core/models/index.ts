export * from "./enums";
export * from "./ClipboardEntry";
