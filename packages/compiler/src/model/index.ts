// Model barrel: pure data types shared by every layer.

export * from "./span.js";
export * from "./text.js";
export * from "./path.js";
export * from "./json.js";
export * from "./types.js";
export * from "./diagnostics.js";
