import { beforeEach, describe, expect, it, vi } from "vitest";
import { FinanzasJobType } from "@/queues/finanzas.queue";
import { CommissionGeneratorService } from "@/services/commission_generator.service";
import { CommissionReconcilerService } from "@/services/commission_reconciler.service";
import { ReceiptIssuerService } from "@/services/receipt_issuer.service";
import { FinanzasProcessor } from "@/workers/finanzas.processor";
import { MemoryFinanzasRepository } from "./helpers/memory-finanzas.repository";

describe("FinanzasProcessor", () => {
    let repo: MemoryFinanzasRepository;
    let processor: FinanzasProcessor;

    beforeEach(() => {
        repo = new MemoryFinanzasRepository();
        processor = new FinanzasProcessor({
            receiptIssuer: new ReceiptIssuerService(repo),
            commissionGenerator: new CommissionGeneratorService(repo),
            commissionReconciler: new CommissionReconcilerService(repo),
        });
    });

    it("un pago directo con boleta dispara recibo y comisión de forma independiente", async () => {
        const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
        const method = repo.addPaymentMethod("DIRECT_CASH");
        const { assignment_id } = repo.addDriverChain();
        const payment = { payment_method_id: method, assignment_id, total_amount: 100, issue_receipt: true };
        const payment_id = repo.newId();

        const commission = await processor.process({
            type: FinanzasJobType.GENERATE_COMMISSION,
            data: { payment_id, payment },
        });
        const receipt = await processor.process({ type: FinanzasJobType.ISSUE_RECEIPT, data: { payment_id, payment } });

        expect(commission.status).toBe("applied");
        expect(receipt.status).toBe("applied");
        expect(repo.receipts).toHaveLength(1);
        expect(repo.commissions.size).toBe(1);
        expect(logSpy).toHaveBeenCalledWith(`✅ generate_commission-${payment_id} aplicado`);
        expect(logSpy).toHaveBeenCalledWith(`✅ issue_receipt-${payment_id} aplicado`);
    });

    it("registra las omisiones con su motivo", async () => {
        const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const payment_id = repo.newId();

        const outcome = await processor.process({
            type: FinanzasJobType.ISSUE_RECEIPT,
            data: { payment_id, payment: { payment_method_id: "", assignment_id: "", total_amount: 10 } },
        });

        expect(outcome).toEqual({ status: "skipped", reason: "missing_payment_method" });
        expect(warnSpy).toHaveBeenCalledWith(`⏭️ issue_receipt-${payment_id} omitido: missing_payment_method`);
    });

    it("registra el marcador de inconsistencia", async () => {
        const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const method = repo.addPaymentMethod("DIRECT_CASH");
        const payment = await repo.insertPayment({
            payment_method_id: method,
            assignment_id: repo.newId(),
            total_amount: 50,
            issue_receipt: true,
            receipt_type_code: "INVOICE",
        });

        await processor.process({
            type: FinanzasJobType.ISSUE_RECEIPT,
            data: { payment_id: payment._id, payment },
        });

        expect(warnSpy).toHaveBeenCalledWith(
            `⚠️ issue_receipt-${payment._id} marcado como inconsistente: INVOICE_REQUIRES_APP_METHOD`
        );
    });

    it("despacha la conciliación de abonos", async () => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        const commission = repo.addCommission({ driver_id: repo.newId(), amount: 20 });
        const abono = await repo.insertCommissionPayment({ commission_id: commission._id, amount: 20 });

        const outcome = await processor.process({
            type: FinanzasJobType.RECONCILE_COMMISSION,
            data: {
                commission_payment_id: abono._id,
                commission_payment: { commission_id: commission._id, amount: 20 },
            },
        });

        expect(outcome.status === "applied" && outcome.result.status).toBe("PAID");
    });

    it("propaga los errores del almacén para que el trabajo se reintente", async () => {
        vi.spyOn(repo, "findPaymentMethod").mockRejectedValue(new Error("connection reset"));

        await expect(
            processor.process({
                type: FinanzasJobType.GENERATE_COMMISSION,
                data: {
                    payment_id: repo.newId(),
                    payment: { payment_method_id: repo.newId(), assignment_id: repo.newId(), total_amount: 10 },
                },
            })
        ).rejects.toThrow("connection reset");
    });
});
