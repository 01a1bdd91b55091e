export * from "./enums.js";
export * from "./errors.js";
export * from "./message.js";
export * from "./tool.js";
export * from "./options.js";
export * from "./request.js";
export * from "./response.js";
export * from "./stream.js";
export * from "./descriptors.js";
