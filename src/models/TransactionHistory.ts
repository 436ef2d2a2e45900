import { Transaction } from './Transaction';

/**
 * Append-only transaction ledger with a per-cardholder index.
 * The index always holds exactly the ledger's transactions for each cardholder, in insertion order.
 * Single writer; reads must not overlap with add().
 */
export class TransactionHistory {
    private readonly transactions: Transaction[] = [];
    private readonly indexByCardholder = new Map<string, Transaction[]>();

    add(transaction: Transaction): void {
        this.transactions.push(transaction);

        const cardholderTransactions = this.indexByCardholder.get(transaction.cardholderId);
        if (cardholderTransactions) {
            cardholderTransactions.push(transaction);
        } else {
            this.indexByCardholder.set(transaction.cardholderId, [transaction]);
        }
    }

    get size(): number {
        return this.transactions.length;
    }

    all(): readonly Transaction[] {
        return this.transactions;
    }

    byCardholder(cardholderId: string): readonly Transaction[] {
        return this.indexByCardholder.get(cardholderId) ?? [];
    }

    cardholderIds(): string[] {
        return [...this.indexByCardholder.keys()];
    }

    /**
     * Transactions with start <= timestamp <= end
     */
    inTimeframe(cardholderId: string, start: Date, end: Date): Transaction[] {
        const from = start.getTime();
        const to = end.getTime();
        return this.byCardholder(cardholderId).filter(t => {
            const time = t.timestamp.getTime();
            return from <= time && time <= to;
        });
    }

    totalAmount(cardholderId: string): number {
        return this.byCardholder(cardholderId).reduce((sum, t) => sum + t.amount, 0);
    }

    findById(transactionId: string): Transaction | undefined {
        return this.transactions.find(t => t.transactionId === transactionId);
    }

    fraudTransactions(): Transaction[] {
        return this.transactions.filter(t => t.isFraud);
    }

    /**
     * Flag the first transaction with this id. Returns false when no such transaction exists.
     */
    markFraud(transactionId: string): boolean {
        const transaction = this.findById(transactionId);
        if (!transaction) {
            return false;
        }
        transaction.isFraud = true;
        return true;
    }
}
