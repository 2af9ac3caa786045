export * from "./types/api.js";
export * from "./types/chat.js";
export * from "./store.js";
