import { DIAGNOSTIC_TEMPLATES, DiagnosticRecorder, ParseError, createDiagnostic, formatColumn } from '@/diagnostics';
import type { DiagnosticAnchor } from '@/diagnostics';
import type { DiagnosticSink } from '@/types';
import { DIAGNOSTIC_KIND } from '@/utils/constants';
import { describe, expect, it, vi } from 'vitest';

describe('diagnostics', () => {
  describe('formatColumn()', () => {
    it('should pad single digit columns to two digits', () => {
      expect(formatColumn(0)).toBe(': col=00');
      expect(formatColumn(7)).toBe(': col=07');
    });

    it('should not truncate wider columns', () => {
      expect(formatColumn(42)).toBe(': col=42');
      expect(formatColumn(123)).toBe(': col=123');
    });
  });

  describe('createDiagnostic()', () => {
    it('should substitute the offending character', () => {
      expect(createDiagnostic(DIAGNOSTIC_KIND.MISSING_COLON, 5, 0x78)).toEqual({
        kind: 'MissingColon',
        message: "expecting colon (':') character, got 'x' character: col=05",
        position: 5,
      });
    });

    it('should leave templates without placeholder untouched', () => {
      expect(createDiagnostic(DIAGNOSTIC_KIND.ILLEGAL_NEWLINE, 7).message).toBe('illegal newline: col=07');
    });

    it('should render non-ASCII bytes one by one', () => {
      expect(createDiagnostic(DIAGNOSTIC_KIND.EARLY_EXIT, 9, 0xb1).message).toBe("early exit after '±' character: col=09");
    });

    it('should have a template for every kind', () => {
      expect(Object.keys(DIAGNOSTIC_TEMPLATES).sort()).toEqual(Object.values(DIAGNOSTIC_KIND).sort());
    });
  });

  describe('ParseError', () => {
    it('should carry the diagnostic', () => {
      const diagnostic = createDiagnostic(DIAGNOSTIC_KIND.EMPTY_INPUT, 0);
      const error = new ParseError(diagnostic);

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ParseError');
      expect(error.message).toBe('empty input: col=00');
      expect(error.diagnostic).toBe(diagnostic);
    });
  });

  describe('DiagnosticRecorder', () => {
    const buffer = new TextEncoder().encode('feat!');

    it('should start empty', () => {
      expect(new DiagnosticRecorder(buffer).current).toBeNull();
    });

    it('should resolve character anchors against the cursor position', () => {
      const expectations: Array<[DiagnosticAnchor, string]> = [
        ['current', "early exit after 't' character: col=03"],
        ['previous', "early exit after 'a' character: col=03"],
        ['last', "early exit after 'a' character: col=02"],
      ];

      for (const [anchor, message] of expectations) {
        const recorder = new DiagnosticRecorder(buffer);
        recorder.record('unconditional', DIAGNOSTIC_KIND.EARLY_EXIT, anchor, 3);
        expect(recorder.current?.message).toBe(message);
      }
    });

    it('should resolve column anchors against the cursor position', () => {
      const recorder = new DiagnosticRecorder(buffer);

      recorder.record('unconditional', DIAGNOSTIC_KIND.ILLEGAL_NEWLINE, 'column', 3);
      expect(recorder.current?.message).toBe('illegal newline: col=03');

      recorder.record('unconditional', DIAGNOSTIC_KIND.ILLEGAL_NEWLINE, 'nextColumn', 3);
      expect(recorder.current?.message).toBe('illegal newline: col=04');
    });

    it('should keep the advisory against defensive writers', () => {
      const recorder = new DiagnosticRecorder(buffer);
      recorder.advise(4);
      recorder.record('defensive', DIAGNOSTIC_KIND.MISSING_COLON, 'current', 4);

      expect(recorder.current?.message).toBe("early exit after '!' character: col=04");
    });

    it('should replace the advisory with unconditional writers', () => {
      const recorder = new DiagnosticRecorder(buffer);
      recorder.advise(4);
      recorder.record('unconditional', DIAGNOSTIC_KIND.MALFORMED_SCOPE, 'current', 4);

      expect(recorder.current?.message).toBe("illegal '!' character in scope: col=04");
    });

    it('should forward every write to the sink', () => {
      const sink: DiagnosticSink = { info: vi.fn(), error: vi.fn() };
      const recorder = new DiagnosticRecorder(buffer, sink);

      recorder.advise(4);
      recorder.record('defensive', DIAGNOSTIC_KIND.MISSING_COLON, 'current', 4);
      recorder.record('unconditional', DIAGNOSTIC_KIND.EMPTY_INPUT, 'column', 0);

      expect(vi.mocked(sink.error).mock.calls).toEqual([
        ["early exit after '!' character: col=04"],
        ['empty input: col=00'],
      ]);
    });
  });
});
