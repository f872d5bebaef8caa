import { Fraction } from "./Fraction";

export * as Types from "./types";
export * as Utils from "./utils";
export * as ContinuedFraction from "./ContinuedFraction";

export * from "./Fraction";
export * from "./FractionConfig";
export * from "./operators";

export default Fraction;
