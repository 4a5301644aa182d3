/**
 * Codec Module - Error Types
 *
 * Typed error unions for wire encoding and decoding.
 * Errors are values, not exceptions. Every error carries the dotted path
 * of the field it concerns, e.g. `ZonesV2.Setpoint` or `Dev[2].Ch[0].Pwr`.
 */

export type CodecError =
  | {
      readonly type: "ENCODE_FAILED";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "DECODE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly raw: unknown;
    }
  | {
      readonly type: "FIELD_TOO_LONG";
      readonly path: string;
      readonly maxBytes: number;
      readonly actualBytes: number;
    }
  | {
      readonly type: "ARRAY_LENGTH_MISMATCH";
      readonly path: string;
      readonly expected: number;
      readonly actual: number;
    };

export const encodeFailed = (path: string, message: string): CodecError => ({
  type: "ENCODE_FAILED",
  path,
  message,
});

export const decodeFailed = (
  path: string,
  message: string,
  raw: unknown,
): CodecError => ({
  type: "DECODE_FAILED",
  path,
  message,
  raw,
});

/**
 * @param actualBytes - UTF-8 length including the terminator
 */
export const fieldTooLong = (
  path: string,
  maxBytes: number,
  actualBytes: number,
): CodecError => ({
  type: "FIELD_TOO_LONG",
  path,
  maxBytes,
  actualBytes,
});

export const arrayLengthMismatch = (
  path: string,
  expected: number,
  actual: number,
): CodecError => ({
  type: "ARRAY_LENGTH_MISMATCH",
  path,
  expected,
  actual,
});

/**
 * Format a CodecError for logging.
 */
export function formatCodecError(error: CodecError): string {
  switch (error.type) {
    case "ENCODE_FAILED":
      return `Encode failed at ${error.path}: ${error.message}`;
    case "DECODE_FAILED":
      return `Decode failed at ${error.path}: ${error.message}`;
    case "FIELD_TOO_LONG":
      return `Field ${error.path} is ${error.actualBytes} bytes, limit ${error.maxBytes}`;
    case "ARRAY_LENGTH_MISMATCH":
      return `Array ${error.path} has ${error.actual} entries, expected ${error.expected}`;
  }
}
