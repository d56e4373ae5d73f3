export * from "./address.js";
export * from "./errors.js";
export * from "./fees.js";
export * from "./ids.js";
export * from "./json.js";
export * from "./plan.js";
export * from "./plan-codec.js";
export * from "./swap.js";
