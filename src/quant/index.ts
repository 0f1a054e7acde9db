/**
 * Performance & Risk Metrics Engine — barrel export
 */

export * from "./valuation.js";
export * from "./time-series.js";
export * from "./performance.js";
export * from "./alerts.js";
export * from "./report.js";
