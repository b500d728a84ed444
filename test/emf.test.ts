import { describe, it, expect } from 'vitest';
import {
  EMF_SCALING_CONSTANT,
  EMF_MAX_SECONDS,
  secondsToEmf,
  emfToSeconds,
  quantizeSeconds,
  CodecError,
} from '../src/codec/index.js';

describe('Quantized time (EMF)', () => {
  describe('secondsToEmf / emfToSeconds', () => {
    it('should stay within 0.1s for whole seconds 1..30', () => {
      for (let time = 1; time <= 30; time++) {
        const seconds = emfToSeconds(secondsToEmf(time));
        expect(seconds).toBeGreaterThanOrEqual(0);
        expect(Math.abs(seconds - time)).toBeLessThanOrEqual(0.1);
      }
    });

    it('should represent whole seconds up to 30 exactly', () => {
      for (let time = 1; time <= 30; time++) {
        expect(quantizeSeconds(time)).toBe(time);
      }
    });

    it('should put the mantissa in the high nibble and exponent in the low nibble', () => {
      // 7s = C * (1 + 12/16) * 2^6
      expect(secondsToEmf(7)).toBe(0xc6);
      // 6s = C * (1 + 8/16) * 2^6
      expect(secondsToEmf(6)).toBe(0x86);
      // 1s = C * 2^4
      expect(secondsToEmf(1)).toBe(0x04);
    });

    it('should round up to the next representable value', () => {
      // 2.01s falls between 2s (0x05) and 2.125s (0x15)
      expect(secondsToEmf(2.01)).toBe(0x15);
      expect(quantizeSeconds(2.01)).toBe(2.125);
    });

    it('should carry a full mantissa into the exponent', () => {
      // 3.99s needs mantissa 16 at exponent 5, which becomes 4s
      expect(secondsToEmf(3.99)).toBe(0x06);
      expect(quantizeSeconds(3.99)).toBe(4);
    });

    it('should never quantize below the input and stay within one step', () => {
      for (let x = 0.1; x < 1000; x += 0.37) {
        const q = quantizeSeconds(x);
        expect(q).toBeGreaterThanOrEqual(x);
        expect(q - x).toBeLessThanOrEqual(x / 16 + 1e-9);
      }
    });

    it('should map small durations to the smallest value', () => {
      // Ceiling rounding picks 0x00 (C itself), not 0x10 from a negative-exponent fallback
      expect(secondsToEmf(0)).toBe(0x00);
      expect(secondsToEmf(0.03)).toBe(0x00);
      expect(secondsToEmf(EMF_SCALING_CONSTANT)).toBe(0x00);
      expect(emfToSeconds(0x00)).toBe(EMF_SCALING_CONSTANT);
    });

    it('should clamp large durations to the largest value', () => {
      expect(EMF_MAX_SECONDS).toBe(3968);
      expect(secondsToEmf(5000)).toBe(0xff);
      expect(emfToSeconds(0xff)).toBe(3968);
    });

    it('should decode every byte and encode it back unchanged', () => {
      for (let byte = 0; byte <= 0xff; byte++) {
        const seconds = emfToSeconds(byte);
        expect(seconds).toBeGreaterThan(0);
        expect(secondsToEmf(seconds)).toBe(byte);
      }
    });

    it('should reject negative and non-finite durations', () => {
      expect(() => secondsToEmf(-1)).toThrow(CodecError);
      expect(() => secondsToEmf(Number.NaN)).toThrow('Invalid duration');
      expect(() => secondsToEmf(Number.POSITIVE_INFINITY)).toThrow('Invalid duration');
    });
  });
});
