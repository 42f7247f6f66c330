export * from "./dispatchQueue";
export * from "./fetcher";
export * from "./hostThrottle";
export * from "./scheduler";
export * from "./seenSet";
export * from "./validator";
