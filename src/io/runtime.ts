/**
 * Effect platform layer for file I/O
 *
 * Provides the FileSystem and Path services the readers depend on.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the current process
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
