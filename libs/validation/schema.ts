import { z } from 'zod';

/**
 * Wire schemas for the counterparty notification endpoint.
 * Wire names (tranRefNo, srcAccountNumber, ...) are mapped to domain names here and nowhere else.
 */

const optionalText = z.string().nullish().transform(value => value ?? null);

/**
 * Batch header fields that take part in the signature.
 */
export const CanonicalFieldsSchema = z.object({
    sourceAppId: z.string(),
    batchId: z.string(),
    timestamp: z.string(),
});

/**
 * Envelope of a signed batch. Records stay `unknown` here so that one malformed
 * record fails alone instead of failing the whole batch.
 */
export const NotificationBatchSchema = CanonicalFieldsSchema.extend({
    signature: z.string().min(1),
    data: z.array(z.unknown()).min(1, 'Batch must contain at least one transaction'),
});

/**
 * Structural schema for one transaction record. Business rules (lengths, sign of
 * the amount, known type codes) are checked afterwards so that every violation is
 * reported, not only the first type error.
 */
export const TransactionRecordSchema = z.object({
    transactionId: z.string().default(''),
    tranRefNo: optionalText,
    srcAccountNumber: z.string().default(''),
    amount: z.number().finite(),
    balanceAvailable: z.number().finite().nullish().transform(value => value ?? null),
    transType: z.string().default(''),
    noticeCreatedTime: optionalText,
    transTime: optionalText,
    transDesc: optionalText,
    ofsAccountNumber: optionalText,
    ofsAccountName: optionalText,
    ofsBankId: optionalText,
    ofsBankName: optionalText,
}).transform(record => ({
    transactionId: record.transactionId,
    transactionRefNo: record.tranRefNo,
    sourceAccountNumber: record.srcAccountNumber,
    amount: record.amount,
    availableBalance: record.balanceAvailable,
    transactionType: record.transType,
    noticeCreatedTime: record.noticeCreatedTime,
    transactionTime: record.transTime,
    description: record.transDesc,
    counterpartyAccountNumber: record.ofsAccountNumber,
    counterpartyAccountName: record.ofsAccountName,
    counterpartyBankId: record.ofsBankId,
    counterpartyBankName: record.ofsBankName,
}));

export type CanonicalFields = z.infer<typeof CanonicalFieldsSchema>;
export type NotificationBatchWire = z.infer<typeof NotificationBatchSchema>;
export type TransactionRecordInput = z.output<typeof TransactionRecordSchema>;
