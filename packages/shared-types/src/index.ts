export * from "./cricsheet";
