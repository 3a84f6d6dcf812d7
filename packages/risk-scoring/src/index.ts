export * from "./types";
export * from "./errors";
export * from "./thresholds";
export * from "./registry";
export * from "./history";
export * from "./scoring";
export * from "./patterns";
export * from "./alerts";
export * from "./eventQueue";
export * from "./oracleContext";
export * from "./hash";
export * from "./schema";
export * from "./normalize";
export * from "./adapters/http";
export * from "./adapters/rulesOracleAdapter";
export * from "./adapters/openAiOracleAdapter";
export * from "./adapters/ollamaOracleAdapter";
