import { Types } from "mongoose";
import { CommissionRecord } from "@/models/commission.model";
import { CommissionPaymentRecord } from "@/models/commission_payment.model";
import { DriverAccountBalanceRecord } from "@/models/driver_account_balance.model";
import { PaymentRecord } from "@/models/payment.model";
import { ReceiptRecord } from "@/models/receipt.model";
import { Commission, CommissionPayment, DriverAccountBalance } from "@/contracts/interfaces/commission.interface";
import { Payment } from "@/contracts/interfaces/payment.interface";
import { Receipt } from "@/contracts/interfaces/receipt.interface";

export type WithId<T> = T & { _id: Types.ObjectId };

export const idToString = (id: Types.ObjectId | null | undefined): string | undefined =>
    id ? id.toString() : undefined;

export const toPayment = (doc: WithId<PaymentRecord>): Payment => ({
    _id: doc._id.toString(),
    payment_method_id: doc.payment_method_id.toString(),
    assignment_id: doc.assignment_id.toString(),
    total_amount: doc.total_amount,
    issue_receipt: doc.issue_receipt,
    receipt_type_code: doc.receipt_type_code,
    issuer_fiscal_id: doc.issuer_fiscal_id,
    receiving_company_id: idToString(doc.receiving_company_id),
    receiving_user_id: idToString(doc.receiving_user_id),
    currency: doc.currency,
    inconsistency: doc.inconsistency,
    created_at: doc.created_at,
});

export const toReceipt = (doc: WithId<ReceiptRecord>): Receipt => ({
    _id: doc._id.toString(),
    payment_id: doc.payment_id.toString(),
    receipt_type: doc.receipt_type,
    issuer_fiscal_id: doc.issuer_fiscal_id,
    receiving_company_id: idToString(doc.receiving_company_id) ?? null,
    receiving_user_id: idToString(doc.receiving_user_id) ?? null,
    series: doc.series,
    number: doc.number,
    total: doc.total,
    currency: doc.currency,
    issued_at: doc.issued_at,
});

export const toCommission = (doc: WithId<CommissionRecord>): Commission => ({
    _id: doc._id.toString(),
    payment_id: doc.payment_id.toString(),
    assignment_id: doc.assignment_id.toString(),
    driver_id: doc.driver_id.toString(),
    base_amount: doc.base_amount,
    percentage: doc.percentage,
    amount: doc.amount,
    status: doc.status,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
});

export const toCommissionPayment = (doc: WithId<CommissionPaymentRecord>): CommissionPayment => ({
    _id: doc._id.toString(),
    commission_id: doc.commission_id.toString(),
    amount: doc.amount,
    reference: doc.reference ?? null,
    notes: doc.notes ?? null,
    created_at: doc.created_at,
});

export const toBalance = (doc: WithId<DriverAccountBalanceRecord>): DriverAccountBalance => ({
    _id: doc._id.toString(),
    driver_id: doc.driver_id.toString(),
    balance: doc.balance,
    updated_at: doc.updated_at,
});
