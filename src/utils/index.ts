export * as Complex from "./Complex";
export * as Float from "./Float";
export * as Integer from "./Integer";

export * from "./Logger";
export * from "./sternBrocot";
