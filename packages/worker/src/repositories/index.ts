export * from "./riskAlert.repository";
export * from "./patternFinding.repository";
