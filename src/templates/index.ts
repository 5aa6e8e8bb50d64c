// Conventions document
export * from "./docs/conventions-md.js";

// Layer modules
export * from "./layers/action.js";
export * from "./layers/service.js";
export * from "./layers/data-access.js";
export * from "./module.js";

// Agent rules
export * from "./agents/server-layers-rule.js";

// Config
export * from "./config/layerkit-json.js";
