export * from "./nodes.js";
export * as build from "./builders.js";
