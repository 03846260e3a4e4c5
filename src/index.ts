export * from "./canvas.js";
export * from "./color.js";
export * from "./encode.js";
export * from "./geometry.js";
export * from "./pen.js";
export * from "./registry.js";
export * from "./shapes/index.js";
export * from "./text.js";
export * from "./ui-kit.js";
export type { FillRule, PixelBuffer } from "./raster.js";
