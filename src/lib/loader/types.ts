/**
 * Loader module types
 */

export type DocumentEncoding = "utf-8" | "latin1";

export interface DecodedDocument {
  text: string;
  encoding: DocumentEncoding;
}
