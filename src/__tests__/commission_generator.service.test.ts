import { beforeEach, describe, expect, it } from "vitest";
import { PaymentSnapshot } from "@/contracts/interfaces/payment.interface";
import { CommissionGeneratorService, computeCommissionAmount } from "@/services/commission_generator.service";
import { MemoryFinanzasRepository } from "./helpers/memory-finanzas.repository";

describe("CommissionGeneratorService", () => {
    let repo: MemoryFinanzasRepository;
    let service: CommissionGeneratorService;
    let directMethod: string;

    const paymentEvent = (overrides: Partial<PaymentSnapshot> = {}) => ({
        payment_id: repo.newId(),
        payment: {
            payment_method_id: directMethod,
            assignment_id: "",
            total_amount: 200,
            ...overrides,
        },
    });

    beforeEach(() => {
        repo = new MemoryFinanzasRepository();
        service = new CommissionGeneratorService(repo);
        directMethod = repo.addPaymentMethod("DIRECT_CASH");
    });

    it("genera la comisión del 15% para un pago directo", async () => {
        const { assignment_id, driver_id } = repo.addDriverChain();
        const event = paymentEvent({ assignment_id });

        const outcome = await service.generate_commission_for_payment(event);

        expect(outcome.status).toBe("applied");
        expect(repo.commissions.size).toBe(1);
        expect([...repo.commissions.values()][0]).toMatchObject({
            payment_id: event.payment_id,
            assignment_id,
            driver_id,
            base_amount: 200,
            percentage: 15,
            amount: 30,
            status: "GENERATED",
        });
    });

    it("redondea half-up el monto de la comisión", async () => {
        const { assignment_id } = repo.addDriverChain();

        const outcome = await service.generate_commission_for_payment(paymentEvent({ assignment_id, total_amount: 10.1 }));

        expect(outcome.status === "applied" && outcome.result.amount).toBe(1.52);
    });

    it("omite pagos con método APP_", async () => {
        const { assignment_id } = repo.addDriverChain();
        const appMethod = repo.addPaymentMethod("APP_CARD");

        const outcome = await service.generate_commission_for_payment(
            paymentEvent({ assignment_id, payment_method_id: appMethod })
        );

        expect(outcome).toEqual({ status: "skipped", reason: "not_direct_method" });
        expect(repo.commissions.size).toBe(0);
    });

    it("acepta el prefijo en minúsculas", async () => {
        const { assignment_id } = repo.addDriverChain();
        const lowercase = repo.addPaymentMethod("direct_transfer");

        const outcome = await service.generate_commission_for_payment(
            paymentEvent({ assignment_id, payment_method_id: lowercase })
        );

        expect(outcome.status).toBe("applied");
    });

    it("omite pagos sin método o sin asignación", async () => {
        expect(await service.generate_commission_for_payment(paymentEvent({ payment_method_id: "" }))).toEqual({
            status: "skipped",
            reason: "missing_payment_method",
        });
        expect(await service.generate_commission_for_payment(paymentEvent())).toEqual({
            status: "skipped",
            reason: "missing_assignment",
        });
    });

    it("omite cuando la asignación no existe", async () => {
        const outcome = await service.generate_commission_for_payment(paymentEvent({ assignment_id: repo.newId() }));

        expect(outcome).toEqual({ status: "skipped", reason: "missing_assignment" });
    });

    it("omite cuando falta el vínculo conductor-vehículo", async () => {
        const { assignment_id, link_id } = repo.addDriverChain();
        repo.links.delete(link_id);

        const outcome = await service.generate_commission_for_payment(paymentEvent({ assignment_id }));

        expect(outcome).toEqual({ status: "skipped", reason: "missing_driver_link" });
    });

    it("omite cuando el vínculo no tiene conductor", async () => {
        const { assignment_id, link_id } = repo.addDriverChain();
        repo.links.set(link_id, { _id: link_id });

        const outcome = await service.generate_commission_for_payment(paymentEvent({ assignment_id }));

        expect(outcome).toEqual({ status: "skipped", reason: "missing_driver" });
        expect(repo.commissions.size).toBe(0);
    });

    it("una segunda entrega del mismo pago no genera otra comisión", async () => {
        const { assignment_id } = repo.addDriverChain();
        const event = paymentEvent({ assignment_id });

        await service.generate_commission_for_payment(event);
        const second = await service.generate_commission_for_payment(event);

        expect(second).toEqual({ status: "skipped", reason: "already_generated" });
        expect(repo.commissions.size).toBe(1);
    });

    it("usa 0 como base cuando el monto no es numérico", async () => {
        const { assignment_id } = repo.addDriverChain();

        const outcome = await service.generate_commission_for_payment(
            paymentEvent({ assignment_id, total_amount: Number.NaN })
        );

        expect(outcome.status === "applied" && outcome.result).toMatchObject({ base_amount: 0, amount: 0 });
    });
});

describe("computeCommissionAmount", () => {
    it("calcula el porcentaje redondeado a 2 decimales", () => {
        expect(computeCommissionAmount(100, 15)).toBe(15);
        expect(computeCommissionAmount(10.1, 15)).toBe(1.52);
        expect(computeCommissionAmount(33.33, 15)).toBe(5);
    });
});
