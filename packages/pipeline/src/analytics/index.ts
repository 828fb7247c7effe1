export { analyticsQuery, materializeAnalytics } from "./view";
export { buildAnalyticsRows } from "./buildAnalyticsRows";
export * from "./reports";
