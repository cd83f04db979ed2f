/**
 * Line reader for plain and gzip-compressed dump files.
 */

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { createGunzip } from "node:zlib";
import { InputFileError } from "../core/errors.js";

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export interface ReadLinesOptions {
  encoding?: BufferEncoding;
}

/**
 * Check for the gzip magic number at the start of a file.
 */
export async function isGzipFile(path: string): Promise<boolean> {
  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(GZIP_MAGIC.length);
    const { bytesRead } = await handle.read(buffer, 0, GZIP_MAGIC.length, 0);
    return bytesRead === GZIP_MAGIC.length && GZIP_MAGIC.every((byte, i) => buffer[i] === byte);
  } finally {
    await handle.close();
  }
}

interface TextSource {
  text: Readable;
  /** Streams to destroy when reading stops, file stream included */
  streams: Readable[];
}

function openText(path: string, gzip: boolean, encoding: BufferEncoding): TextSource {
  const file = createReadStream(path);
  if (!gzip) {
    file.setEncoding(encoding);
    return { text: file, streams: [file] };
  }

  const gunzip = createGunzip();
  file.on("error", (error) => gunzip.destroy(error));
  file.pipe(gunzip);
  gunzip.setEncoding(encoding);
  return { text: gunzip, streams: [gunzip, file] };
}

/**
 * Split a stream of text chunks into lines.
 * Strips "\n" and "\r\n"; a final line without terminator is kept.
 */
export async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let carry = "";
  for await (const chunk of chunks) {
    const parts = (carry + chunk).split("\n");
    carry = parts.pop() ?? "";
    for (const part of parts) {
      yield part.endsWith("\r") ? part.slice(0, -1) : part;
    }
  }
  if (carry.length > 0) {
    yield carry.endsWith("\r") ? carry.slice(0, -1) : carry;
  }
}

async function* textChunks(stream: Readable): AsyncGenerator<string> {
  for await (const chunk of stream) {
    yield typeof chunk === "string" ? chunk : String(chunk);
  }
}

/**
 * Read a file line by line, decompressing it when it is gzip data.
 */
export async function* readLines(
  path: string,
  options: ReadLinesOptions = {}
): AsyncGenerator<string> {
  const encoding = options.encoding ?? "utf8";

  let gzip: boolean;
  try {
    gzip = await isGzipFile(path);
  } catch (error) {
    throw new InputFileError(path, error instanceof Error ? error.message : String(error));
  }

  const source = openText(path, gzip, encoding);
  try {
    yield* splitLines(textChunks(source.text));
  } catch (error) {
    throw new InputFileError(path, error instanceof Error ? error.message : String(error));
  } finally {
    for (const stream of source.streams) {
      stream.destroy();
    }
  }
}
