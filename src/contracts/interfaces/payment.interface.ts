export type ReceiptTypeCode = "RECEIPT" | "INVOICE";

export const RECEIPT_TYPE_CODES: readonly ReceiptTypeCode[] = ["RECEIPT", "INVOICE"];

/**
 * Pago de un servicio terminado.
 * Lo crea el flujo de pago; los handlers solo pueden marcar `inconsistency`.
 */
export interface Payment {
    _id: string;
    payment_method_id: string;
    assignment_id: string;
    total_amount: number;
    issue_receipt?: boolean;
    receipt_type_code?: string; // "RECEIPT" | "INVOICE", se compara sin distinguir mayúsculas
    issuer_fiscal_id?: string;
    receiving_company_id?: string; // para INVOICE
    receiving_user_id?: string; // para RECEIPT
    currency?: string; // default "PEN"
    inconsistency?: string;
    created_at?: Date;
}

export type NewPayment = Omit<Payment, "_id" | "inconsistency" | "created_at">;

export interface PaymentMethod {
    _id: string;
    code: string; // ej. "APP_CARD", "DIRECT_CASH"
    name?: string;
}

/** Contenido del pago tal como lo entrega el disparador de creación */
export type PaymentSnapshot = Omit<Payment, "_id" | "created_at">;
