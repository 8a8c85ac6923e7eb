export * from "./OrderedList";
export * from "./ReadOnlyState";
export * from "./Logger";
export * from "./LogPrinter";
export * from "./Env";
