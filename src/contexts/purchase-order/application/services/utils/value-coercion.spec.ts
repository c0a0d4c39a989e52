import { MANUAL_ENTRY_COLUMNS, type ColumnMap } from '../../../domain/value-objects';
import {
  computeAmount,
  parseAmount,
  roundHalfEven,
  toCanonicalLine,
  toInteger,
  toText,
} from './value-coercion';

describe('value coercion', () => {
  describe('parseAmount', () => {
    it('strips currency marks and thousands separators', () => {
      expect(parseAmount('¥6,000')).toBe(6000);
      expect(parseAmount('￥1,250.5')).toBe(1250.5);
    });

    it('reads full-width digits and separators', () => {
      expect(parseAmount('\uFF16\uFF10\uFF10\uFF10')).toBe(6000);
      expect(parseAmount('\uFFE5\uFF16,\uFF10\uFF10\uFF10')).toBe(6000);
      expect(parseAmount('\uFFE5\uFF16\uFF0C\uFF10\uFF10\uFF10')).toBe(6000);
      expect(parseAmount('\uFF0D\uFF11\uFF12\uFF0E\uFF15')).toBe(-12.5);
    });

    it('drops inner whitespace when the plain parse fails', () => {
      expect(parseAmount('￥ 1 200')).toBe(1200);
    });

    it('treats blank values as absent', () => {
      expect(parseAmount('')).toBeNull();
      expect(parseAmount('   ')).toBeNull();
      expect(parseAmount(null)).toBeNull();
      expect(parseAmount(undefined)).toBeNull();
      expect(parseAmount(Number.NaN)).toBeNull();
    });

    it('returns null for text that is not a number', () => {
      expect(parseAmount('abc')).toBeNull();
      expect(parseAmount('12abc')).toBeNull();
      expect(parseAmount('Infinity')).toBeNull();
    });

    it('passes finite numbers through', () => {
      expect(parseAmount(60.6)).toBe(60.6);
      expect(parseAmount(-3)).toBe(-3);
    });
  });

  describe('toInteger', () => {
    it('rounds half to even', () => {
      expect(toInteger('60.600')).toBe(61);
      expect(toInteger('2.5')).toBe(2);
      expect(toInteger('3.5')).toBe(4);
      expect(roundHalfEven(-2.5)).toBe(-2);
      expect(roundHalfEven(1.4)).toBe(1);
    });

    it('rounds full-width quantities', () => {
      expect(toInteger('\uFF11\uFF12')).toBe(12);
    });

    it('keeps unparseable quantities absent', () => {
      expect(toInteger('n/a')).toBeNull();
      expect(toInteger('')).toBeNull();
    });
  });

  describe('computeAmount', () => {
    it('counts missing factors as zero', () => {
      expect(computeAmount(null, null)).toBe(0);
      expect(computeAmount(10, null)).toBe(0);
    });

    it('multiplies quantity by unit price', () => {
      expect(computeAmount(6000, 60.6)).toBeCloseTo(363600, 6);
    });
  });

  describe('toText', () => {
    it('renders dates as ISO dates and trims text', () => {
      expect(toText(new Date('2024-05-01T00:00:00Z'))).toBe('2024-05-01');
      expect(toText('  A-1 ')).toBe('A-1');
      expect(toText(12)).toBe('12');
      expect(toText(null)).toBe('');
    });
  });

  describe('toCanonicalLine', () => {
    const columns: ColumnMap = {
      controlNo: 'Control NO',
      itemNo: 'Item NO',
      barcode: 'JAN',
      qty: 'Qty',
      price: 'Price',
      delivery: 'Delivery',
    };

    it('coerces every field through the column map', () => {
      const line = toCanonicalLine(
        {
          'Control NO': 'C1',
          'Item NO': 'I1',
          JAN: 4901234567890,
          Qty: '10',
          Price: '¥1,250.5',
          Delivery: '2024-06',
        },
        columns,
      );

      expect(line).toEqual({
        controlNo: 'C1',
        itemNo: 'I1',
        barcode: '4901234567890',
        qty: 10,
        price: 1250.5,
        delivery: '2024-06',
        amount: 12505,
      });
    });

    it('fills absent values with empty text and null numbers', () => {
      const line = toCanonicalLine({ controlNo: 'C9', itemNo: 'I9' }, MANUAL_ENTRY_COLUMNS);

      expect(line).toEqual({
        controlNo: 'C9',
        itemNo: 'I9',
        barcode: '',
        qty: null,
        price: null,
        delivery: '',
        amount: 0,
      });
    });
  });
});
