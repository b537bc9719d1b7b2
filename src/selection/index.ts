export * from "./selection.types";
export * from "./selector";
