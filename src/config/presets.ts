import type { PolicyConfig, RiskPresetName } from "./schema";

/**
 * Risk presets overlay the policy defaults before explicit env values apply.
 * "balanced" is the defaults as-is.
 */
export const RISK_PRESETS: Record<RiskPresetName, Partial<PolicyConfig>> = {
  conservative: {
    accountRiskPerTrade: 0.0025,
    maxNotionalPerTrade: 100,
    maxLeverage: 5,
    maxOpenPositions: 2,
    entrySlippagePct: 0.2,
    minSignalQuality: 0.5,
  },
  balanced: {},
  aggressive: {
    accountRiskPerTrade: 0.01,
    maxNotionalPerTrade: 500,
    maxLeverage: 20,
    maxOpenPositions: 5,
    entrySlippagePct: 0.5,
  },
};

export function isRiskPresetName(value: string): value is RiskPresetName {
  return value === "conservative" || value === "balanced" || value === "aggressive";
}
