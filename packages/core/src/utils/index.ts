export * from "./json.js";
export * from "./http.js";
export * from "./retry.js";
export * from "./sse.js";
export * from "./ndjson.js";
export * from "./error-mapping.js";
export * from "./logger.js";
export * from "./hash.js";
