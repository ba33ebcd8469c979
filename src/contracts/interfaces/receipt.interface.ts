import { ReceiptTypeCode } from "@/contracts/interfaces/payment.interface";

export interface Receipt {
    _id: string;
    payment_id: string;
    receipt_type: ReceiptTypeCode;
    issuer_fiscal_id: string;
    receiving_company_id: string | null;
    receiving_user_id: string | null;
    series: string;
    number: string;
    total: number;
    currency: string;
    issued_at: Date;
}

export type ReceiptDraft = Omit<Receipt, "_id" | "issued_at">;
