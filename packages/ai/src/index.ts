export * from "./lib";
export * from "./translate/config";
export * from "./translate/engines";
export * from "./translate/batch-protocol";
export * from "./translate/translate-entries";
