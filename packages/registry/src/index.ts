/**
 * @shortlink/registry - In-memory short code registry
 */

export { LinkRegistry, createRegistry } from "./registry.js";
export type { RegistryOptions, LinkTarget } from "./registry.js";
