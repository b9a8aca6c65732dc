/**
 * Effect platform layer selection
 *
 * Every file operation runs as an Effect program against the platform
 * FileSystem service; this module supplies the layer that provides it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for file I/O
 *
 * Returns a Layer that provides FileSystem, Path, and other platform services.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const fs = yield* FileSystem.FileSystem;
 *   return yield* fs.readFileString("family.sto");
 * });
 * const text = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
