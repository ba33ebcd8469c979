export type CommissionStatus = "GENERATED" | "PARTIAL" | "PAID";

export const COMMISSION_STATUSES: readonly CommissionStatus[] = ["GENERATED", "PARTIAL", "PAID"];

/**
 * Comisión que un conductor debe a la plataforma por un pago cobrado directamente
 */
export interface Commission {
    _id: string;
    payment_id: string;
    assignment_id: string;
    driver_id: string;
    base_amount: number;
    percentage: number;
    amount: number;
    status?: CommissionStatus; // ausente se lee como GENERATED
    created_at: Date;
    updated_at?: Date;
}

export type CommissionDraft = Omit<Commission, "_id" | "created_at" | "updated_at">;

/**
 * Abono parcial o total contra una comisión. Solo se agregan, nunca se modifican.
 */
export interface CommissionPayment {
    _id: string;
    commission_id: string;
    amount: number;
    reference?: string | null;
    notes?: string | null;
    created_at?: Date;
}

export type NewCommissionPayment = Omit<CommissionPayment, "_id" | "created_at">;

/**
 * Estado de cuenta del conductor: suma de comisiones no pagadas
 */
export interface DriverAccountBalance {
    _id: string;
    driver_id: string;
    balance: number;
    updated_at: Date;
}

/** Contenido del abono tal como lo entrega el disparador de creación */
export type CommissionPaymentSnapshot = Omit<CommissionPayment, "_id" | "created_at">;
