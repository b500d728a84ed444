export type CodecErrorCode =
  | 'BUFFER_UNDERRUN'   // Fewer bytes available than a fixed field needs
  | 'BUFFER_OVERFLOW'   // Writer capacity exceeded
  | 'SIZE_MISMATCH'     // Declared size does not reconcile with the bytes
  | 'INVALID_FIELD';    // Value does not fit its wire field

/**
 * Error thrown by the packet and message codecs
 */
export class CodecError extends Error {
  constructor(
    message: string,
    public readonly code: CodecErrorCode
  ) {
    super(message);
    this.name = 'CodecError';
  }
}

export function isCodecError(error: unknown, code?: CodecErrorCode): error is CodecError {
  return error instanceof CodecError && (code === undefined || error.code === code);
}
