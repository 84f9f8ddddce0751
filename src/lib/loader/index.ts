/**
 * Document loading
 * Reads a JSON file into memory and parses it before inference runs
 */

import fs from "fs/promises";
import type { JsonValue } from "../../types/schema-node.js";
import type { DecodedDocument } from "./types.js";
import { FileIOError, MalformedJsonError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

/**
 * Decode raw bytes as UTF-8, dropping a leading byte order mark, and fall
 * back to Latin-1 when the bytes are not valid UTF-8
 */
export function decodeDocument(bytes: Buffer): DecodedDocument {
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    return { text, encoding: "utf-8" };
  } catch (error) {
    logger.debug("Document is not valid UTF-8, decoding as Latin-1", {
      reason: error instanceof Error ? error.message : String(error),
    });
    return { text: bytes.toString("latin1"), encoding: "latin1" };
  }
}

/**
 * Parse JSON text
 *
 * @param text - Document contents
 * @param source - File path or label used in error details
 * @throws MalformedJsonError for empty or syntactically invalid input
 */
export function parseJsonDocument(text: string, source = "<input>"): JsonValue {
  if (text.trim().length === 0) {
    throw new MalformedJsonError(`Document is empty: ${source}`, { source });
  }

  let document: JsonValue;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const position = /position (\d+)/.exec(reason);

    throw new MalformedJsonError(
      `Malformed JSON in ${source}: ${reason}`,
      {
        source,
        ...(position ? { position: parseInt(position[1], 10) } : {}),
      },
      { cause: error },
    );
  }

  return document;
}

/**
 * Load and parse a JSON document from disk
 * @param filePath Path to the JSON file
 * @returns Parsed document
 */
export async function loadJsonDocument(filePath: string): Promise<JsonValue> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new FileIOError(
      `Failed to read document from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath },
      { cause: error },
    );
  }

  const { text, encoding } = decodeDocument(bytes);
  const document = parseJsonDocument(text, filePath);

  logger.info("Loaded JSON document", {
    filePath,
    encoding,
    bytes: bytes.byteLength,
  });

  return document;
}
