// Errors
export * from "./errors.js";

// Configuration
export * from "./config.js";

// Observability
export * from "./observability/index.js";

// Numbering
export * from "./numbering/numberToken.js";

// Styles
export * from "./styles/numberStyle.js";
export * from "./styles/styleCatalog.js";

// Annotations
export * from "./annotations/numberAnnotation.js";

// Store
export * from "./store/annotationStore.js";

// History
export * from "./history/undoLog.js";
export * from "./history/commands.js";
export * from "./history/commandExecutor.js";

// Surface contract
export * from "./surface/annotationSurface.js";

// Session
export * from "./session/documentSession.js";
