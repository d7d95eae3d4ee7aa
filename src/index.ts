// Session model
export * from "./shared/types.js";
export * from "./shared/errors.js";
export * from "./shared/request.js";
export * from "./shared/response.js";
export * from "./shared/session.js";
export * from "./shared/serialization.js";

// Filtering
export * from "./filter/criteria.js";
export * from "./filter/engine.js";

// Storage
export * from "./storage/storage.js";
export * from "./storage/memory-storage.js";
export * from "./storage/file-storage.js";
export * from "./storage/sqlite-storage.js";

// Search
export * from "./search/fields.js";
export * from "./search/text-matcher.js";
export * from "./search/date-range.js";
export * from "./search/search-service.js";

export { createLogger, parseVerbosity, type Logger, type LogLevel } from "./shared/logger.js";
