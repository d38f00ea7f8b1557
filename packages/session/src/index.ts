export * from "./config";
export * from "./analysisSession";
