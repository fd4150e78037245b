export * from "./binary-codec/binary-codec";
export * from "./errors/errors";
export * from "./events/event-system";
export * from "./fixed-ticker/fixed-ticker";
export * from "./generate-id/generate-id";
export * from "./interpolator/interpolator";
export * from "./lerp/lerp";
export * from "./logger/logger";
