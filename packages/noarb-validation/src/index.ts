export * from "./gates";
export * from "./report";
export { classify, excess } from "./outcome";
export { DEFAULT_GATE_CONFIG } from "./config/defaults";
export { loadGateConfig, resetGateConfigCache } from "./config/configManager";
export { ConfigFileSchema, GateConfigSchema, ToleranceBandSchema, ProductLimitsSchema } from "./config/schema";
