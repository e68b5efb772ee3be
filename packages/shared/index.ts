export * from "./types.js";
export * from "./errors.js";
export * from "./dates.js";
export * from "./recurrence.js";
export * from "./labels.js";
export * from "./matcher.js";
export * from "./weeks.js";
export * from "./jobs.js";
export * from "./briefing-source.js";
export * from "./store/types.js";
export * from "./store/pg-slot-store.js";
export * from "./store/pg-config-store.js";
export * from "./services/maintainer.js";
export * from "./services/date-filter.js";
export * from "./services/slot-editor.js";
export * from "./services/summary.js";
