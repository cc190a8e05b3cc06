export * from "./types";
export * from "./errors";
export * from "./envelope";
export * from "./security";
export * from "./route";
export * from "./stream-id";
export * from "./timestamp";
export * from "./parse";
export * from "./convert";
export * from "./encode";
export * from "./format";
