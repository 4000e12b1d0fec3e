/**
 * Tests for CSV Parsing Utilities
 *
 * Bank statement parsing:
 * - Header validation
 * - Date parsing (ISO and US formats)
 * - Amount cleaning (currency symbols, commas)
 * - Row validation and whole-file parsing
 */

import {
  validateCsvHeaders,
  parsePostedAt,
  cleanAmount,
  parseRow,
  parseBankStatement,
} from '../../src/utils/csv';

describe('CSV Utilities', () => {
  // ============================================
  // Header validation
  // ============================================
  describe('validateCsvHeaders', () => {
    it('should pass with all required columns', () => {
      const result = validateCsvHeaders(['posted_at', 'amount']);

      expect(result.valid).toBe(true);
      expect(result.missing).toHaveLength(0);
    });

    it('should be case insensitive and trim whitespace', () => {
      const result = validateCsvHeaders([' Posted_At ', 'AMOUNT', 'Description']);

      expect(result.valid).toBe(true);
    });

    it('should report missing columns', () => {
      const result = validateCsvHeaders(['posted_at', 'description']);

      expect(result.valid).toBe(false);
      expect(result.missing).toEqual(['amount']);
    });
  });

  // ============================================
  // Field parsing
  // ============================================
  describe('parsePostedAt', () => {
    it('should parse ISO dates as UTC midnight', () => {
      expect(parsePostedAt('2024-03-10')).toBe('2024-03-10T00:00:00.000Z');
    });

    it('should parse US dates as UTC calendar dates', () => {
      expect(parsePostedAt('03/10/2024')).toBe('2024-03-10T00:00:00.000Z');
    });

    it('should keep full timestamps', () => {
      expect(parsePostedAt('2024-03-10T14:30:00Z')).toBe('2024-03-10T14:30:00.000Z');
    });

    it('should return null for empty or invalid values', () => {
      expect(parsePostedAt('')).toBeNull();
      expect(parsePostedAt(undefined)).toBeNull();
      expect(parsePostedAt('not-a-date')).toBeNull();
    });
  });

  describe('cleanAmount', () => {
    it('should strip currency symbols and thousands separators', () => {
      expect(cleanAmount('$1,234.50')).toBe('1234.50');
    });

    it('should keep plain amounts unchanged', () => {
      expect(cleanAmount('99.99')).toBe('99.99');
    });
  });

  // ============================================
  // Row parsing
  // ============================================
  describe('parseRow', () => {
    it('should normalize a valid row', () => {
      const result = parseRow(
        {
          posted_at: '2024-03-10',
          amount: '$1,250.5',
          currency: 'usd',
          external_id: ' TX-1 ',
          description: 'ACH ACME',
        },
        1
      );

      expect(result).toEqual({
        success: true,
        rowNumber: 1,
        data: {
          posted_at: '2024-03-10T00:00:00.000Z',
          amount: '1250.50',
          currency: 'USD',
          external_id: 'TX-1',
          description: 'ACH ACME',
        },
      });
    });

    it('should use the default currency when the column is blank', () => {
      const result = parseRow({ posted_at: '2024-03-10', amount: '10', currency: '' }, 3, {
        defaultCurrency: 'EUR',
      });

      expect(result.success && result.data.currency).toBe('EUR');
    });

    it('should turn blank optional fields into null', () => {
      const result = parseRow(
        { posted_at: '2024-03-10', amount: '10', currency: 'USD', external_id: '', description: '' },
        1
      );

      expect(result.success && result.data.external_id).toBeNull();
      expect(result.success && result.data.description).toBeNull();
    });

    it('should reject an invalid date', () => {
      const result = parseRow({ posted_at: 'yesterday', amount: '10', currency: 'USD' }, 4);

      expect(result).toEqual({ success: false, error: 'Invalid posted_at: "yesterday"', rowNumber: 4 });
    });

    it('should reject a non-positive amount', () => {
      const result = parseRow({ posted_at: '2024-03-10', amount: '-5.00', currency: 'USD' }, 2);

      expect(result).toEqual({
        success: false,
        error: 'amount: amount must be greater than 0',
        rowNumber: 2,
      });
    });
  });

  // ============================================
  // Whole-file parsing
  // ============================================
  describe('parseBankStatement', () => {
    it('should parse every data row', async () => {
      const csv = [
        'Posted_At,Amount,Currency,External_Id,Description',
        '2024-03-10,100.00,USD,TX-1,INV-1 ACME',
        '2024-03-11,"1,000.00",USD,,Wire',
      ].join('\n');

      const statement = await parseBankStatement(Buffer.from(csv));

      expect(statement.total).toBe(2);
      expect(statement.errors).toEqual([]);
      expect(statement.items.map((item) => item.amount)).toEqual(['100.00', '1000.00']);
      expect(statement.items[1].external_id).toBeNull();
    });

    it('should collect row errors with row numbers', async () => {
      const csv = ['posted_at,amount,currency', '2024-03-10,100.00,USD', 'bad,100.00,USD'].join('\n');

      const statement = await parseBankStatement(csv);

      expect(statement.items).toHaveLength(1);
      expect(statement.errors).toEqual([{ rowNumber: 2, error: 'Invalid posted_at: "bad"' }]);
    });

    it('should reject files without required columns', async () => {
      const csv = ['date,amount', '2024-03-10,100.00'].join('\n');

      await expect(parseBankStatement(csv)).rejects.toThrow('Missing required columns: posted_at');
    });
  });
});
