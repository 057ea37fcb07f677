export * from "./errors";
export * from "./glob";
export * from "./naming";
export * from "./patterns";
export * from "./record";
export * from "./resolve";
export * from "./timestamp";
