export * from "./dimensions";
export * from "./facts";
export * from "./naturalKey";
export * from "./starSchema";
