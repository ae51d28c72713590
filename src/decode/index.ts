export * from "./decoders.js";
export * from "./text-parser.js";
