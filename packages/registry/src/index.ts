export { buildRegistry, defaultRegistry } from "./build.js";
export type { RegistryOptions } from "./build.js";
export { PycRegistry } from "./registry.js";
export type { ResolvedVersion } from "./registry.js";
