import { beforeEach, describe, expect, it } from "vitest";
import {
    CommissionReconcilerService,
    outstandingBalance,
    resolveCommissionStatus,
} from "@/services/commission_reconciler.service";
import { MemoryFinanzasRepository } from "./helpers/memory-finanzas.repository";

const driver_id = "d00000000000000000000001";

describe("CommissionReconcilerService", () => {
    let repo: MemoryFinanzasRepository;
    let service: CommissionReconcilerService;

    const pay = async (commission_id: string, amount: number) => {
        const payment = await repo.insertCommissionPayment({ commission_id, amount });
        return service.reconcile_commission_payment({
            commission_payment_id: payment._id,
            commission_payment: { commission_id, amount },
        });
    };

    beforeEach(() => {
        repo = new MemoryFinanzasRepository();
        service = new CommissionReconcilerService(repo);
    });

    it("pasa a PARTIAL con un abono menor al monto", async () => {
        const commission = repo.addCommission({ driver_id, amount: 30 });

        const outcome = await pay(commission._id, 10);

        expect(outcome.status === "applied" && outcome.result).toMatchObject({
            commission_id: commission._id,
            status: "PARTIAL",
            total_paid: 10,
            balance: { driver_id, balance: 30 },
        });
        expect(repo.commissions.get(commission._id)?.status).toBe("PARTIAL");
    });

    it("pasa a PAID cuando los abonos cubren el monto exacto", async () => {
        const commission = repo.addCommission({ driver_id, amount: 30 });
        const other = repo.addCommission({ driver_id, amount: 12.5 });

        await pay(commission._id, 10.1);
        const outcome = await pay(commission._id, 19.9);

        expect(outcome.status === "applied" && outcome.result.status).toBe("PAID");
        expect(repo.commissions.get(commission._id)?.status).toBe("PAID");
        expect(repo.commissions.get(other._id)?.status).toBe("GENERATED");
        expect(repo.balances).toHaveLength(1);
        expect(repo.balances[0]).toMatchObject({ driver_id, balance: 12.5 });
    });

    it("un sobrepago también queda PAID", async () => {
        const commission = repo.addCommission({ driver_id, amount: 15 });

        const outcome = await pay(commission._id, 20);

        expect(outcome.status === "applied" && outcome.result.status).toBe("PAID");
        expect(repo.balances[0].balance).toBe(0);
    });

    it("una comisión de monto 0 queda PAID", async () => {
        const commission = repo.addCommission({ driver_id, amount: 0 });

        const outcome = await pay(commission._id, 0);

        expect(outcome.status === "applied" && outcome.result.status).toBe("PAID");
    });

    it("cuenta como pendiente una comisión sin estado", async () => {
        const legacy = repo.addCommission({ driver_id, amount: 7.25 });
        delete legacy.status;
        const commission = repo.addCommission({ driver_id, amount: 30 });

        await pay(commission._id, 5);

        expect(repo.balances[0].balance).toBe(37.25);
    });

    it("no mezcla comisiones de otros conductores", async () => {
        repo.addCommission({ driver_id: "d00000000000000000000002", amount: 100 });
        const commission = repo.addCommission({ driver_id, amount: 30 });

        await pay(commission._id, 5);

        expect(repo.balances).toEqual([expect.objectContaining({ driver_id, balance: 30 })]);
    });

    it("omite abonos sin comisión o con comisión inexistente", async () => {
        expect(
            await service.reconcile_commission_payment({
                commission_payment_id: repo.newId(),
                commission_payment: { commission_id: "", amount: 10 },
            })
        ).toEqual({ status: "skipped", reason: "missing_commission" });

        expect(await pay(repo.newId(), 10)).toEqual({ status: "skipped", reason: "missing_commission" });
        expect(repo.balances).toHaveLength(0);
    });

    it("dos abonos concurrentes terminan en el estado correcto", async () => {
        const commission = repo.addCommission({ driver_id, amount: 30 });
        const first = await repo.insertCommissionPayment({ commission_id: commission._id, amount: 15 });
        const second = await repo.insertCommissionPayment({ commission_id: commission._id, amount: 15 });

        await Promise.all(
            [first, second].map((payment) =>
                service.reconcile_commission_payment({
                    commission_payment_id: payment._id,
                    commission_payment: { commission_id: payment.commission_id, amount: payment.amount },
                })
            )
        );

        expect(repo.commissions.get(commission._id)?.status).toBe("PAID");
        expect(repo.balances[0].balance).toBe(0);
    });

    it("recalcula el estado de cuenta bajo demanda", async () => {
        repo.addCommission({ driver_id, amount: 10.1 });
        repo.addCommission({ driver_id, amount: 20.2 });
        repo.addCommission({ driver_id, amount: 50, status: "PAID" });

        const balance = await service.recompute_driver_balance({ driver_id });

        expect(balance).toMatchObject({ driver_id, balance: 30.3 });
    });
});

describe("resolveCommissionStatus", () => {
    it("deriva el estado de lo abonado", () => {
        expect(resolveCommissionStatus(0, 30)).toBe("GENERATED");
        expect(resolveCommissionStatus(0.01, 30)).toBe("PARTIAL");
        expect(resolveCommissionStatus(30, 30)).toBe("PAID");
        expect(resolveCommissionStatus(0, 0)).toBe("PAID");
    });
});

describe("outstandingBalance", () => {
    it("suma solo las comisiones no pagadas", () => {
        const base = { payment_id: "p", assignment_id: "a", driver_id, base_amount: 0, percentage: 15, created_at: new Date(0) };
        expect(
            outstandingBalance([
                { ...base, _id: "1", amount: 0.1, status: "GENERATED" },
                { ...base, _id: "2", amount: 0.2, status: "PARTIAL" },
                { ...base, _id: "3", amount: 5, status: "PAID" },
            ])
        ).toBe(0.3);
    });
});
