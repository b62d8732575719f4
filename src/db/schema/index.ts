export * from "./check-history.js";
