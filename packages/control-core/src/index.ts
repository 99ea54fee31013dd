export * from "./types";
export * from "./events";
export * from "./InputActionMapper";
export * from "./dispatch";
