export * from "./geometry.js";
export * from "./metadata.js";
export * from "./pdfAnnotationSurface.js";
export * from "./pdfSession.js";
