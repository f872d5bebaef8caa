export * from "./FractionOptions";
export * from "./Ordering";
