export * from "./transitions.js";
