import dotenv from "dotenv";
import mongoose from "mongoose";
dotenv.config();

const toNumber = (value: string | undefined, fallback: number): number => {
    const parsed = Number(value);
    return value !== undefined && value !== "" && Number.isFinite(parsed) ? parsed : fallback;
};

export const ALLOWED_ORIGINS = (process.env.ALLOWED_ORIGINS || "http://localhost:5173,http://localhost:5174")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

export const ALLOWED_METHODS = [
    "GET", 
    "POST", 
    "OPTIONS"
];

export const GLOBAL_ENV = {
    MONGODB_URI: process.env.MONGODB_URI || "",
    MONGODB_DB_NAME: process.env.MONGODB_DB_NAME || "comisiones_transporte_db",

    PORT: toNumber(process.env.PORT, 3000),
    NODE_ENV: process.env.NODE_ENV || "development",
    ROUTER_SUBFIJE: process.env.ROUTER_SUBFIJE || "",

    REDIS_HOST: process.env.REDIS_HOST || "localhost",
    REDIS_PORT: toNumber(process.env.REDIS_PORT, 6379),
    REDIS_DB: toNumber(process.env.REDIS_DB, 0),
    REDIS_PASSWORD: process.env.REDIS_PASSWORD || "",

    FINANZAS_WORKER_CONCURRENCY: toNumber(process.env.FINANZAS_WORKER_CONCURRENCY, 5),
    BALANCE_SWEEP_CRON: process.env.BALANCE_SWEEP_CRON || "0 * * * *",
    CRON_TIMEZONE: process.env.CRON_TIMEZONE || "America/Lima",
} as const;

/**
 * Reglas de negocio de recibos y comisiones.
 * Son constantes del negocio, no configuración por entorno.
 */
export const FINANZAS_RULES = {
    COMMISSION_PERCENTAGE: 15.0,
    APP_METHOD_PREFIX: "APP_",
    DIRECT_METHOD_PREFIX: "DIRECT_",
    DEFAULT_RECEIPT_TYPE: "RECEIPT",
    INVOICE_SERIES: "F001",
    RECEIPT_SERIES: "B001",
    RECEIPT_NUMBER_DIGITS: 8,
    MAX_AMOUNT: 999999999.99,
    // Diferencia aceptada al comparar un abono contra la deuda pendiente
    DEBT_TOLERANCE: 0.01,
    PLATFORM_ISSUER_ID: "PLATFORM",
    DEFAULT_CURRENCY: "PEN",
    INVOICE_REQUIRES_APP_MARKER: "INVOICE_REQUIRES_APP_METHOD",
    BALANCE_STALE_HOURS: 24,
} as const;

export const MongoIdRef = mongoose.Schema.Types.ObjectId;
