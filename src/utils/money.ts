/**
 * Redondeo half-up a 2 decimales sobre el límite del centavo.
 * `toPrecision(15)` descarta el ruido binario (10.1 * 15 / 100 = 1.5149999...)
 * antes de redondear.
 */
export const round2 = (value: number): number => {
    if (!Number.isFinite(value)) return 0;
    const normalized = Number(value.toPrecision(15));
    const abs = Math.abs(normalized);
    if (abs < 1e-6) return 0;
    // Desde 1e15 un double ya no representa centavos; además `${abs}` saldría en notación exponencial
    if (abs >= 1e15) return normalized;
    const rounded = Number(`${Math.round(Number(`${abs}e2`))}e-2`);
    return normalized < 0 ? -rounded : rounded;
};

// Number(x) || 0, pero sin aceptar Infinity
export const toAmount = (value: unknown): number => {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
};

export const sumAmounts = (values: number[]): number =>
    round2(values.reduce((acc, value) => acc + toAmount(value), 0));
