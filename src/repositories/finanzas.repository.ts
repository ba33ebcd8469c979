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

/**
 * Acceso al almacén de documentos de finanzas.
 *
 * Las lecturas por id devuelven `null` cuando el id no existe o no es válido.
 * Las inserciones idempotentes (`insertReceipt`, `insertCommission`) devuelven `null`
 * cuando el pago ya tenía su documento derivado.
 */
export interface FinanzasRepository {
    findPaymentMethod(id: string): Promise<PaymentMethod | null>;
    findAssignment(id: string): Promise<Assignment | null>;
    findDriverVehicleLink(id: string): Promise<DriverVehicleLink | null>;

    insertPayment(input: NewPayment): Promise<Payment>;
    findPayment(id: string): Promise<Payment | null>;
    flagPaymentInconsistency(payment_id: string, marker: string): Promise<void>;

    findReceiptByPayment(payment_id: string): Promise<Receipt | null>;
    nextReceiptNumber(series: string): Promise<number>;
    insertReceipt(draft: ReceiptDraft): Promise<Receipt | null>;

    findCommission(id: string): Promise<Commission | null>;
    findCommissionByPayment(payment_id: string): Promise<Commission | null>;
    insertCommission(draft: CommissionDraft): Promise<Commission | null>;
    findCommissionsByDriver(driver_id: string, status?: CommissionStatus): Promise<Commission[]>;
    updateCommissionStatus(id: string, status: CommissionStatus): Promise<void>;

    insertCommissionPayment(input: NewCommissionPayment): Promise<CommissionPayment>;
    findCommissionPayments(commission_id: string): Promise<CommissionPayment[]>;

    findDriverBalance(driver_id: string): Promise<DriverAccountBalance | null>;
    upsertDriverBalance(driver_id: string, balance: number): Promise<DriverAccountBalance>;
    /**
     * Conductores a recalcular: saldo anterior a `cutoff`, comisiones sin registro de saldo,
     * o abonos desde `cutoff` más nuevos que su saldo.
     */
    findDriversWithStaleBalance(cutoff: Date): Promise<string[]>;

    runInTransaction<T>(work: (repository: FinanzasRepository) => Promise<T>): Promise<T>;
}
