// SPDX-License-Identifier: Apache-2.0

/**
 * Converts between nested plain objects and their text form.
 */
export interface ObjectCodec {
  /**
   * File extension, including the leading dot, for documents this codec writes.
   */
  readonly extension: string;

  encode(data: object): string;

  /**
   * @throws {CodecError} when the text is not a valid document
   */
  decode(text: string): unknown;
}
