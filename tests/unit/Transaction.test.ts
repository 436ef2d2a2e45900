import { ParseError, ValidationError } from '../../src/middleware/errorHandler';
import { Transaction, parseTimestamp } from '../../src/models/Transaction';
import { makeRecord, makeTransaction } from '../helpers';

describe('parseTimestamp', () => {
    it('should read timestamps without a zone as UTC', () => {
        expect(parseTimestamp('2024-03-04T12:30').toISOString()).toBe('2024-03-04T12:30:00.000Z');
        expect(parseTimestamp('2024-03-04 08:15:30').toISOString()).toBe('2024-03-04T08:15:30.000Z');
    });

    it('should apply offsets and truncate sub-millisecond digits', () => {
        expect(parseTimestamp('2024-03-04T12:30:45.123456+0200').toISOString())
            .toBe('2024-03-04T10:30:45.123Z');
        expect(parseTimestamp('2024-03-04T12:30:45.5-05:00').toISOString())
            .toBe('2024-03-04T17:30:45.500Z');
    });

    it('should accept a bare date', () => {
        expect(parseTimestamp('2024-03-04').toISOString()).toBe('2024-03-04T00:00:00.000Z');
    });

    it('should throw ParseError for malformed input', () => {
        expect(() => parseTimestamp('yesterday')).toThrow(ParseError);
        expect(() => parseTimestamp('2024-13-45T00:00:00')).toThrow(ParseError);
    });

    it('should throw ParseError for days the calendar does not have', () => {
        expect(() => parseTimestamp('2024-02-30T10:00:00Z')).toThrow(ParseError);
        expect(() => parseTimestamp('2023-02-29')).toThrow(ParseError);
        expect(() => parseTimestamp('2024-04-31T08:00')).toThrow(ParseError);
        expect(() => parseTimestamp('2024-03-04T24:00:00Z')).toThrow(ParseError);
        expect(parseTimestamp('2024-02-29T10:00:00Z').toISOString()).toBe('2024-02-29T10:00:00.000Z');
    });
});

describe('Transaction', () => {
    it('should build a transaction from a record', () => {
        const transaction = Transaction.fromRecord(makeRecord());

        expect(transaction.transactionId).toBe('tx-record-1');
        expect(transaction.cardholderId).toBe('card-001');
        expect(transaction.amount).toBe(42.5);
        expect(transaction.timestamp.toISOString()).toBe('2024-03-04T12:30:00.000Z');
        expect(transaction.merchantCategory).toBe('grocery');
        expect(transaction.transactionType).toBe('purchase');
        expect(transaction.location).toEqual({ latitude: 40.7128, longitude: -74.006 });
        expect(transaction.isFraud).toBe(false);
    });

    it('should serialize back to the record shape', () => {
        const record = makeRecord({ timestamp: '2024-03-04T12:30:00.000Z', is_fraud: true });

        expect(Transaction.fromRecord(record).toRecord()).toEqual(record);
    });

    it('should generate a transaction id when none is given', () => {
        const record: Record<string, unknown> = { ...makeRecord() };
        delete record['transaction_id'];

        const transaction = Transaction.fromRecord(record);

        expect(transaction.transactionId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should reject an unknown merchant category', () => {
        expect(() => Transaction.fromRecord(makeRecord({ merchant_category: 'casino' })))
            .toThrow(ValidationError);
    });

    it('should reject an unknown transaction type', () => {
        expect(() => Transaction.fromRecord(makeRecord({ transaction_type: 'refund' })))
            .toThrow(ValidationError);
    });

    it('should reject a record without an amount', () => {
        const record: Record<string, unknown> = { ...makeRecord() };
        delete record['amount'];

        expect(() => Transaction.fromRecord(record)).toThrow(ValidationError);
    });

    it('should reject out-of-range coordinates', () => {
        expect(() => Transaction.fromRecord(makeRecord({ location: { latitude: 95, longitude: 0 } })))
            .toThrow(ValidationError);
    });

    it('should throw ParseError for a malformed timestamp', () => {
        expect(() => Transaction.fromRecord(makeRecord({ timestamp: 'not-a-date' }))).toThrow(ParseError);
    });

    it('should reject a non-finite amount at construction', () => {
        expect(() => makeTransaction({ amount: Number.NaN })).toThrow(ValidationError);
    });

    it('should keep its location immutable', () => {
        const transaction = makeTransaction();

        expect(Object.isFrozen(transaction.location)).toBe(true);
    });
});
