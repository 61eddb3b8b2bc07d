import {HttpErrors} from '@loopback/rest';
import {expect} from '@loopback/testlab';
import {SanitizationUtils} from '../../../utils';

describe('Sanitization Utils (unit)', () => {
  describe('sanitizeIdentifier()', () => {
    it('trims identifiers', () => {
      expect(SanitizationUtils.sanitizeIdentifier('  QR-1 ')).to.equal('QR-1');
    });

    it('throws bad request on blank or oversized identifiers', () => {
      for (const test of [undefined, '', '   ', 'x'.repeat(256)]) {
        expect(() => SanitizationUtils.sanitizeIdentifier(test)).to.throw(
          HttpErrors.BadRequest,
        );
      }
    });
  });

  describe('sanitizeNote()', () => {
    it('drops blank notes', () => {
      expect(SanitizationUtils.sanitizeNote('  ')).to.be.undefined();
    });

    it('rejects oversized notes', () => {
      expect(() => SanitizationUtils.sanitizeNote('n'.repeat(2001))).to.throw(
        'Notes cannot exceed 2000 characters',
      );
    });
  });

  describe('sanitizeEnum()', () => {
    it('returns the matching value', () => {
      expect(
        SanitizationUtils.sanitizeEnum(['A', 'B'] as const, 'B', 'letter'),
      ).to.equal('B');
    });

    it('lists the accepted values', () => {
      expect(() =>
        SanitizationUtils.sanitizeEnum(['A', 'B'] as const, 'C', 'letter'),
      ).to.throw('Invalid letter, expected one of A, B');
    });
  });

  describe('sanitizeDateRange()', () => {
    it('accepts an empty range', () => {
      const at = new Date('2026-01-01T00:00:00.000Z');
      expect(() => SanitizationUtils.sanitizeDateRange(at, at)).to.not.throw();
    });

    it('rejects a reversed range', () => {
      expect(() =>
        SanitizationUtils.sanitizeDateRange(
          new Date('2026-01-02T00:00:00.000Z'),
          new Date('2026-01-01T00:00:00.000Z'),
        ),
      ).to.throw('Start date must be before end date');
    });
  });
});
