import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import { ParseError, ValidationError } from '../middleware/errorHandler';
import {
    GeoPoint,
    MerchantCategory,
    TransactionRecord,
    TransactionType,
    isMerchantCategory,
    isTransactionType,
} from '../types';

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

// Date rolls 2024-02-30 over to March; a real calendar day survives the round trip
function isCalendarDate(date: string): boolean {
    const [year, month, day] = date.split('-').map(Number);
    const calendar = new Date(0);
    calendar.setUTCFullYear(year, month - 1, day);
    return calendar.getUTCFullYear() === year
        && calendar.getUTCMonth() === month - 1
        && calendar.getUTCDate() === day;
}

/**
 * Parse an ISO-8601 timestamp. Values without a zone designator are read as UTC.
 */
export function parseTimestamp(value: string): Date {
    const match = ISO_TIMESTAMP.exec(value.trim());
    if (!match) {
        throw new ParseError(`Invalid ISO-8601 timestamp: ${value}`);
    }

    const [, date, time = '00:00:00', fraction = '', zone = 'Z'] = match;
    const seconds = time.length === 5 ? `${time}:00` : time;
    const millis = fraction ? fraction.slice(0, 4).padEnd(4, '0') : '';
    const offset = zone.toUpperCase() === 'Z'
        ? 'Z'
        : zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;

    const parsed = new Date(`${date}T${seconds}${millis}${offset}`);
    if (Number.isNaN(parsed.getTime()) || !isCalendarDate(date) || Number(seconds.slice(0, 2)) > 23) {
        throw new ParseError(`Invalid ISO-8601 timestamp: ${value}`);
    }
    return parsed;
}

export function toMerchantCategory(value: string): MerchantCategory {
    if (!isMerchantCategory(value)) {
        throw new ValidationError(`Unknown merchant category: ${value}`);
    }
    return value;
}

export function toTransactionType(value: string): TransactionType {
    if (!isTransactionType(value)) {
        throw new ValidationError(`Unknown transaction type: ${value}`);
    }
    return value;
}

export interface TransactionProps {
    transactionId: string;
    cardholderId: string;
    amount: number;
    timestamp: Date;
    merchantName: string;
    merchantCategory: MerchantCategory;
    transactionType: TransactionType;
    location: GeoPoint;
    mccCode: string;
    country: string;
    isFraud?: boolean;
}

const transactionRecordSchema = Joi.object<TransactionRecord>({
    transaction_id: Joi.string().default(() => uuidv4()),
    cardholder_id: Joi.string().required(),
    amount: Joi.number().required(),
    timestamp: Joi.string().required(),
    merchant_name: Joi.string().required(),
    merchant_category: Joi.string().required(),
    transaction_type: Joi.string().required(),
    location: Joi.object({
        latitude: Joi.number().min(-90).max(90).required(),
        longitude: Joi.number().min(-180).max(180).required(),
    }).required(),
    mcc_code: Joi.string().allow('').required(),
    country: Joi.string().required(),
    is_fraud: Joi.boolean().default(false),
});

/**
 * A single card transaction. Everything except the fraud flag is fixed at construction.
 */
export class Transaction {
    readonly transactionId: string;
    readonly cardholderId: string;
    readonly amount: number;
    readonly timestamp: Date;
    readonly merchantName: string;
    readonly merchantCategory: MerchantCategory;
    readonly transactionType: TransactionType;
    readonly location: Readonly<GeoPoint>;
    readonly mccCode: string;
    readonly country: string;
    isFraud: boolean;

    constructor(props: TransactionProps) {
        if (!Number.isFinite(props.amount)) {
            throw new ValidationError(`Invalid amount for transaction ${props.transactionId}`);
        }
        if (Number.isNaN(props.timestamp.getTime())) {
            throw new ParseError(`Invalid timestamp for transaction ${props.transactionId}`);
        }

        this.transactionId = props.transactionId;
        this.cardholderId = props.cardholderId;
        this.amount = props.amount;
        this.timestamp = new Date(props.timestamp.getTime());
        this.merchantName = props.merchantName;
        this.merchantCategory = toMerchantCategory(props.merchantCategory);
        this.transactionType = toTransactionType(props.transactionType);
        this.location = Object.freeze({
            latitude: props.location.latitude,
            longitude: props.location.longitude,
        });
        this.mccCode = props.mccCode;
        this.country = props.country;
        this.isFraud = props.isFraud ?? false;
    }

    /**
     * Build a transaction from its serialized form
     */
    static fromRecord(input: unknown): Transaction {
        const { error, value } = transactionRecordSchema.validate(input);
        if (error) {
            throw new ValidationError(`Invalid transaction: ${error.details[0]?.message ?? error.message}`);
        }

        return new Transaction({
            transactionId: value.transaction_id,
            cardholderId: value.cardholder_id,
            amount: value.amount,
            timestamp: parseTimestamp(value.timestamp),
            merchantName: value.merchant_name,
            merchantCategory: toMerchantCategory(value.merchant_category),
            transactionType: toTransactionType(value.transaction_type),
            location: value.location,
            mccCode: value.mcc_code,
            country: value.country,
            isFraud: value.is_fraud,
        });
    }

    toRecord(): TransactionRecord {
        return {
            transaction_id: this.transactionId,
            cardholder_id: this.cardholderId,
            amount: this.amount,
            timestamp: this.timestamp.toISOString(),
            merchant_name: this.merchantName,
            merchant_category: this.merchantCategory,
            transaction_type: this.transactionType,
            location: { latitude: this.location.latitude, longitude: this.location.longitude },
            mcc_code: this.mccCode,
            country: this.country,
            is_fraud: this.isFraud,
        };
    }

    toJSON(): TransactionRecord {
        return this.toRecord();
    }
}
