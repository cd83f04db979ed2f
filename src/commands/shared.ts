/**
 * Helpers shared by the commands that read dump files.
 */

import { LineAssembler } from "../core/assembler.js";
import { RemintError } from "../core/errors.js";
import { debug } from "../core/logger.js";
import { readLines } from "../input/reader.js";

/**
 * Feed every file to the assembler, strictly one after another.
 */
export async function feedFiles(
  assembler: LineAssembler,
  files: readonly string[],
  encoding: BufferEncoding = "utf8"
): Promise<void> {
  for (const file of files) {
    debug(`Reading ${file}`);
    assembler.beginSource(file);
    for await (const line of readLines(file, { encoding })) {
      assembler.push(line);
    }
  }
}

/**
 * Validate an encoding name from the command line.
 */
export function parseEncoding(value: string): BufferEncoding {
  if (!Buffer.isEncoding(value)) {
    throw new RemintError(`Unknown encoding: ${value}`, 2);
  }
  return value;
}
