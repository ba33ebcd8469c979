import { TriggerOutcome, skipped } from "@/contracts/globals";
import { PaymentSnapshot, ReceiptTypeCode } from "@/contracts/interfaces/payment.interface";
import { Receipt } from "@/contracts/interfaces/receipt.interface";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { FINANZAS_RULES } from "@/utils/constants";
import { round2, toAmount } from "@/utils/money";

export interface PaymentInconsistency {
    payment_id: string;
    inconsistency: string;
}

export type ReceiptOutcome = TriggerOutcome<Receipt, PaymentInconsistency>;

// Cualquier código distinto de INVOICE se emite como RECEIPT
export const resolveReceiptType = (code?: string | null): ReceiptTypeCode =>
    (code ?? "").trim().toUpperCase() === "INVOICE" ? "INVOICE" : FINANZAS_RULES.DEFAULT_RECEIPT_TYPE;

/**
 * Emisión de recibos al crearse un pago
 */
export class ReceiptIssuerService {
    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {}

    private formatNumber(seq: number): string {
        return String(seq).padStart(FINANZAS_RULES.RECEIPT_NUMBER_DIGITS, "0");
    }

    /**
     * Decide si el pago lleva recibo y de qué tipo.
     * Una FACTURA (INVOICE) solo se emite con métodos APP_*; si no, se marca el pago
     * como inconsistente y no se emite nada.
     */
    public async issue_receipt_for_payment({
        payment_id,
        payment
    }: {
        payment_id: string;
        payment: PaymentSnapshot;
    }): Promise<ReceiptOutcome> {
        if (!payment.payment_method_id) return skipped("missing_payment_method");
        if (!payment.issue_receipt) return skipped("receipt_not_requested");

        const method = await this.repository.findPaymentMethod(payment.payment_method_id);
        const code = (method?.code ?? "").toUpperCase();
        const receipt_type = resolveReceiptType(payment.receipt_type_code);

        if (receipt_type === "INVOICE" && !code.startsWith(FINANZAS_RULES.APP_METHOD_PREFIX)) {
            const inconsistency = FINANZAS_RULES.INVOICE_REQUIRES_APP_MARKER;
            await this.repository.flagPaymentInconsistency(payment_id, inconsistency);
            return { status: "flagged", result: { payment_id, inconsistency } };
        }

        const existing = await this.repository.findReceiptByPayment(payment_id);
        if (existing) return skipped("already_issued");

        const series = receipt_type === "INVOICE" ? FINANZAS_RULES.INVOICE_SERIES : FINANZAS_RULES.RECEIPT_SERIES;
        const seq = await this.repository.nextReceiptNumber(series);

        const receipt = await this.repository.insertReceipt({
            payment_id,
            receipt_type,
            issuer_fiscal_id: payment.issuer_fiscal_id || FINANZAS_RULES.PLATFORM_ISSUER_ID,
            receiving_company_id: receipt_type === "INVOICE" ? payment.receiving_company_id ?? null : null,
            receiving_user_id: receipt_type === "RECEIPT" ? payment.receiving_user_id ?? null : null,
            series,
            number: this.formatNumber(seq),
            total: round2(toAmount(payment.total_amount)),
            currency: payment.currency || FINANZAS_RULES.DEFAULT_CURRENCY,
        });

        // Otro disparo del mismo pago ganó la carrera
        if (!receipt) return skipped("already_issued");
        return { status: "applied", result: receipt };
    }
}
