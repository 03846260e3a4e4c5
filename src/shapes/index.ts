export * from "./bars.js";
export * from "./buttons.js";
export * from "./controls.js";
export * from "./icons.js";
export * from "./panels.js";
export * from "./presets.js";
