export * from "./riskAlert.entity";
export * from "./patternFinding.entity";
