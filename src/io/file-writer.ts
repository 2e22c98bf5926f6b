/**
 * File writing through the Effect platform FileSystem
 */

import { dirname } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Write a string to a file, creating missing parent directories
 *
 * @throws {FileError} When the directory or file cannot be written
 *
 * @example
 * ```typescript
 * await writeString("out/manifest_metadata.csv", csv);
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const directory = dirname(path);

    yield* fs
      .makeDirectory(directory, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", directory, error)));
    yield* fs
      .writeFileString(path, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

  const result = await Effect.runPromise(Effect.either(program.pipe(Effect.provide(getPlatform()))));
  if (Either.isLeft(result)) {
    throw result.left;
  }
}
