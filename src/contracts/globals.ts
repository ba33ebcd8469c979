export type SkipReason =
    | "missing_payment_method"
    | "receipt_not_requested"
    | "missing_assignment"
    | "not_direct_method"
    | "missing_driver_link"
    | "missing_driver"
    | "missing_commission"
    | "already_issued"
    | "already_generated";

/**
 * Resultado de un handler disparado por la creación de un documento.
 * `skipped` nunca se reintenta.
 */
export type TriggerOutcome<T, F = never> =
    | { status: "applied"; result: T }
    | { status: "flagged"; result: F }
    | { status: "skipped"; reason: SkipReason };

export const skipped = (reason: SkipReason): { status: "skipped"; reason: SkipReason } => ({
    status: "skipped",
    reason,
});
