export * from "./schema";
export { RISK_PRESETS } from "./presets";
export { loadConfig, validateConfig, type EnvSource } from "./env";
