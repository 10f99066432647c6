export type * from "./result.types";
export type * from "./events.types";
export type * from "./storage.types";
export type * from "./config.types";
