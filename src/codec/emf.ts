import { CodecError } from './errors.js';

/**
 * Scaling constant C of the mantissa/exponent time format, in seconds
 */
export const EMF_SCALING_CONSTANT = 0.0625;

/**
 * Largest representable duration: C * (1 + 15/16) * 2^15
 */
export const EMF_MAX_SECONDS = EMF_SCALING_CONSTANT * (1 + 15 / 16) * 2 ** 15;

/**
 * Encode a duration into one byte (RFC 3626 section 18.3)
 *
 * Byte layout: high nibble mantissa `a`, low nibble exponent `b`, with
 * value = C * (1 + a/16) * 2^b. The result is the smallest representable
 * value not below `seconds`; durations past the range clamp to 0xff.
 */
export function secondsToEmf(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new CodecError(`Invalid duration: ${seconds}`, 'INVALID_FIELD');
  }

  if (seconds <= EMF_SCALING_CONSTANT) {
    return 0x00;
  }
  if (seconds >= EMF_MAX_SECONDS) {
    return 0xff;
  }

  const ratio = seconds / EMF_SCALING_CONSTANT;

  // Largest b with 2^b <= T/C
  let b = 0;
  while (b < 15 && ratio >= 2 ** (b + 1)) {
    b++;
  }

  let a = Math.ceil(16 * (ratio / 2 ** b - 1));
  if (a === 16) {
    b += 1;
    a = 0;
  }

  return ((a & 0x0f) << 4) | (b & 0x0f);
}

/**
 * Decode a quantized time byte to seconds. Every byte value is valid.
 */
export function emfToSeconds(emf: number): number {
  const a = (emf >> 4) & 0x0f;
  const b = emf & 0x0f;
  return EMF_SCALING_CONSTANT * (1 + a / 16) * 2 ** b;
}

/**
 * The duration a value actually carries once it has been on the wire
 */
export function quantizeSeconds(seconds: number): number {
  return emfToSeconds(secondsToEmf(seconds));
}
