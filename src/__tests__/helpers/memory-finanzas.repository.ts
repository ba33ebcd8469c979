import { Assignment, DriverVehicleLink } from "@/contracts/interfaces/assignment.interface";
import {
    Commission,
    CommissionDraft,
    CommissionPayment,
    CommissionStatus,
    DriverAccountBalance,
    NewCommissionPayment,
} from "@/contracts/interfaces/commission.interface";
import { NewPayment, Payment, PaymentMethod } from "@/contracts/interfaces/payment.interface";
import { Receipt, ReceiptDraft } from "@/contracts/interfaces/receipt.interface";
import { FinanzasRepository } from "@/repositories/finanzas.repository";

/**
 * Almacén en memoria con la misma semántica que el repositorio de MongoDB.
 * Las transacciones se serializan.
 */
export class MemoryFinanzasRepository implements FinanzasRepository {
    private seq = 0;
    private lock: Promise<unknown> = Promise.resolve();
    private now = new Date("2026-01-15T12:00:00.000Z");

    public paymentMethods = new Map<string, PaymentMethod>();
    public assignments = new Map<string, Assignment>();
    public links = new Map<string, DriverVehicleLink>();
    public payments = new Map<string, Payment>();
    public receipts: Receipt[] = [];
    public counters = new Map<string, number>();
    public commissions = new Map<string, Commission>();
    public commissionPayments: CommissionPayment[] = [];
    public balances: DriverAccountBalance[] = [];

    public newId(): string {
        this.seq++;
        return this.seq.toString(16).padStart(24, "0");
    }

    public setNow(date: Date): void {
        this.now = date;
    }

    private clock(): Date {
        return new Date(this.now.getTime());
    }

    public reset(): void {
        this.seq = 0;
        this.lock = Promise.resolve();
        this.paymentMethods.clear();
        this.assignments.clear();
        this.links.clear();
        this.payments.clear();
        this.receipts = [];
        this.counters.clear();
        this.commissions.clear();
        this.commissionPayments = [];
        this.balances = [];
    }

    // #======== SEMILLAS ========#

    public addPaymentMethod(code: string): string {
        const _id = this.newId();
        this.paymentMethods.set(_id, { _id, code });
        return _id;
    }

    /** asignación -> vínculo conductor_vehículo -> conductor */
    public addDriverChain(driver_id: string = this.newId()): { assignment_id: string; link_id: string; driver_id: string } {
        const link_id = this.newId();
        this.links.set(link_id, { _id: link_id, driver_id });
        const assignment_id = this.newId();
        this.assignments.set(assignment_id, { _id: assignment_id, driver_vehicle_link_id: link_id });
        return { assignment_id, link_id, driver_id };
    }

    public addCommission(input: Partial<Commission> & Pick<Commission, "driver_id" | "amount">): Commission {
        const _id = input._id ?? this.newId();
        const commission: Commission = {
            payment_id: this.newId(),
            assignment_id: this.newId(),
            base_amount: input.amount,
            percentage: 15,
            status: "GENERATED",
            created_at: this.clock(),
            ...input,
            _id,
        };
        this.commissions.set(_id, commission);
        return commission;
    }

    // #======== FinanzasRepository ========#

    public async findPaymentMethod(id: string): Promise<PaymentMethod | null> {
        return this.paymentMethods.get(id) ?? null;
    }

    public async findAssignment(id: string): Promise<Assignment | null> {
        return this.assignments.get(id) ?? null;
    }

    public async findDriverVehicleLink(id: string): Promise<DriverVehicleLink | null> {
        return this.links.get(id) ?? null;
    }

    public async insertPayment(input: NewPayment): Promise<Payment> {
        const payment: Payment = { ...input, _id: this.newId(), created_at: this.clock() };
        this.payments.set(payment._id, payment);
        return payment;
    }

    public async findPayment(id: string): Promise<Payment | null> {
        return this.payments.get(id) ?? null;
    }

    public async flagPaymentInconsistency(payment_id: string, marker: string): Promise<void> {
        const payment = this.payments.get(payment_id);
        if (payment) payment.inconsistency = marker;
    }

    public async findReceiptByPayment(payment_id: string): Promise<Receipt | null> {
        return this.receipts.find((receipt) => receipt.payment_id === payment_id) ?? null;
    }

    public async nextReceiptNumber(series: string): Promise<number> {
        const next = (this.counters.get(series) ?? 0) + 1;
        this.counters.set(series, next);
        return next;
    }

    public async insertReceipt(draft: ReceiptDraft): Promise<Receipt | null> {
        if (this.receipts.some((receipt) => receipt.payment_id === draft.payment_id)) return null;
        const receipt: Receipt = { ...draft, _id: this.newId(), issued_at: this.clock() };
        this.receipts.push(receipt);
        return receipt;
    }

    public async findCommission(id: string): Promise<Commission | null> {
        return this.commissions.get(id) ?? null;
    }

    public async findCommissionByPayment(payment_id: string): Promise<Commission | null> {
        return [...this.commissions.values()].find((commission) => commission.payment_id === payment_id) ?? null;
    }

    public async insertCommission(draft: CommissionDraft): Promise<Commission | null> {
        if (await this.findCommissionByPayment(draft.payment_id)) return null;
        const commission: Commission = { ...draft, _id: this.newId(), created_at: this.clock() };
        this.commissions.set(commission._id, commission);
        return commission;
    }

    public async findCommissionsByDriver(driver_id: string, status?: CommissionStatus): Promise<Commission[]> {
        return [...this.commissions.values()]
            .filter((commission) => commission.driver_id === driver_id)
            .filter((commission) => !status || (commission.status ?? "GENERATED") === status)
            .reverse();
    }

    public async updateCommissionStatus(id: string, status: CommissionStatus): Promise<void> {
        const commission = this.commissions.get(id);
        if (commission) {
            commission.status = status;
            commission.updated_at = this.clock();
        }
    }

    public async insertCommissionPayment(input: NewCommissionPayment): Promise<CommissionPayment> {
        const payment: CommissionPayment = { ...input, _id: this.newId(), created_at: this.clock() };
        this.commissionPayments.push(payment);
        return payment;
    }

    public async findCommissionPayments(commission_id: string): Promise<CommissionPayment[]> {
        return this.commissionPayments
            .filter((payment) => payment.commission_id === commission_id)
            .reverse();
    }

    public async findDriverBalance(driver_id: string): Promise<DriverAccountBalance | null> {
        return this.balances.find((balance) => balance.driver_id === driver_id) ?? null;
    }

    public async upsertDriverBalance(driver_id: string, balance: number): Promise<DriverAccountBalance> {
        const existing = await this.findDriverBalance(driver_id);
        if (existing) {
            existing.balance = balance;
            existing.updated_at = this.clock();
            return existing;
        }
        const created: DriverAccountBalance = { _id: this.newId(), driver_id, balance, updated_at: this.clock() };
        this.balances.push(created);
        return created;
    }

    public async findDriversWithStaleBalance(cutoff: Date): Promise<string[]> {
        const updatedAt = new Map(this.balances.map((balance) => [balance.driver_id, balance.updated_at.getTime()]));
        const driverIds = new Set(
            this.balances
                .filter((balance) => balance.updated_at.getTime() < cutoff.getTime())
                .map((balance) => balance.driver_id)
        );
        for (const commission of this.commissions.values()) {
            if (!updatedAt.has(commission.driver_id)) driverIds.add(commission.driver_id);
        }
        for (const payment of this.commissionPayments) {
            const commission = this.commissions.get(payment.commission_id);
            const createdAt = payment.created_at?.getTime() ?? 0;
            if (!commission || createdAt < cutoff.getTime()) continue;
            const balanceAt = updatedAt.get(commission.driver_id);
            if (balanceAt === undefined || balanceAt < createdAt) driverIds.add(commission.driver_id);
        }
        return [...driverIds];
    }

    public async runInTransaction<T>(work: (repository: FinanzasRepository) => Promise<T>): Promise<T> {
        const run = this.lock.then(() => work(this));
        this.lock = run.catch(() => undefined);
        return run;
    }
}

export const memoryFinanzasRepository = new MemoryFinanzasRepository();
