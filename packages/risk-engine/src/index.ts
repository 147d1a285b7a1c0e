export * from "./riskBand";
export * from "./RiskBandManager";
