export type { VersionRegistry } from "../@types/core/registry";
export { JsonVersionRegistry } from "./JsonVersionRegistry";
