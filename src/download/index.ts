/**
 * Game build download module
 *
 * This module provides functionality for:
 * - Resolving a version to the release asset built for this platform
 * - Streaming the asset to disk while sampling throughput
 * - Installing the runtime library Windows builds need
 */

export * from "./config";
export * from "./core";
