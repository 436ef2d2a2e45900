import { Transaction, TransactionProps } from '../src/models/Transaction';
import { TransactionHistory } from '../src/models/TransactionHistory';
import { GeoPoint, TransactionRecord } from '../src/types';

export const NEW_YORK: GeoPoint = { latitude: 40.7128, longitude: -74.006 };
export const LONDON: GeoPoint = { latitude: 51.5074, longitude: -0.1278 };

let sequence = 0;

export function makeTransaction(overrides: Partial<TransactionProps> = {}): Transaction {
    sequence += 1;
    return new Transaction({
        transactionId: `tx-${sequence}`,
        cardholderId: 'card-001',
        amount: 50,
        timestamp: new Date('2024-03-04T12:00:00Z'),
        merchantName: 'Corner Grocery',
        merchantCategory: 'grocery',
        transactionType: 'purchase',
        location: NEW_YORK,
        mccCode: '5411',
        country: 'US',
        ...overrides,
    });
}

export function makeRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
    return {
        transaction_id: 'tx-record-1',
        cardholder_id: 'card-001',
        amount: 42.5,
        timestamp: '2024-03-04T12:30:00Z',
        merchant_name: 'Corner Grocery',
        merchant_category: 'grocery',
        transaction_type: 'purchase',
        location: { ...NEW_YORK },
        mcc_code: '5411',
        country: 'US',
        is_fraud: false,
        ...overrides,
    };
}

export function historyOf(transactions: readonly Transaction[]): TransactionHistory {
    const history = new TransactionHistory();
    transactions.forEach(transaction => history.add(transaction));
    return history;
}

/**
 * One transaction per listed ISO timestamp, all for the same cardholder
 */
export function transactionsAt(
    timestamps: readonly string[],
    overrides: Partial<TransactionProps> = {}
): Transaction[] {
    return timestamps.map(timestamp => makeTransaction({ ...overrides, timestamp: new Date(timestamp) }));
}
