import swaggerJSDoc from "swagger-jsdoc";
import { GLOBAL_ENV } from "@/utils/constants";

const isProd = GLOBAL_ENV.NODE_ENV === "production";

const timestamp = { type: "string", format: "date-time" };

export const swaggerSpec = swaggerJSDoc({
    definition: {
        openapi: "3.0.3",
        info: {
            title: "COMISIONES TRANSPORTE API",
            version: "1.0.0",
            description: [
                "Pagos, recibos, comisiones de conductores y estados de cuenta.",
                "",
                "Los recibos, las comisiones y los estados de cuenta se derivan en segundo plano",
                "a partir de la creación de pagos y abonos; esta API solo registra y consulta.",
            ].join("\n"),
        },
        servers: [
            {
                url: GLOBAL_ENV.ROUTER_SUBFIJE || "/",
            },
        ],
        tags: [
            { name: "Health", description: "Endpoints de verificación" },
            { name: "Payments", description: "Pagos de servicios y recibos" },
            { name: "Commissions", description: "Comisiones y abonos" },
            { name: "Drivers", description: "Estado de cuenta de conductores" },
        ],
        components: {
            schemas: {
                ErrorResponse: {
                    type: "object",
                    properties: {
                        ok: { type: "boolean", example: false },
                        message: { type: "string", example: "Error" },
                    },
                    required: ["ok", "message"],
                },
                HealthResponse: {
                    type: "object",
                    properties: {
                        ok: { type: "boolean", example: true },
                        message: { type: "string", example: "Server is running" },
                        timestamp,
                        ip: { type: "string", example: "::1" },
                    },
                },
                PaymentInput: {
                    type: "object",
                    properties: {
                        payment_method_id: { type: "string" },
                        assignment_id: { type: "string" },
                        total_amount: { type: "number", example: 100 },
                        issue_receipt: { type: "boolean", default: false },
                        receipt_type_code: { type: "string", enum: ["RECEIPT", "INVOICE"], default: "RECEIPT" },
                        issuer_fiscal_id: { type: "string" },
                        receiving_company_id: { type: "string" },
                        receiving_user_id: { type: "string" },
                        currency: { type: "string", example: "PEN" },
                    },
                    required: ["payment_method_id", "assignment_id", "total_amount"],
                },
                Payment: {
                    allOf: [
                        { $ref: "#/components/schemas/PaymentInput" },
                        {
                            type: "object",
                            properties: {
                                _id: { type: "string" },
                                inconsistency: { type: "string", example: "INVOICE_REQUIRES_APP_METHOD" },
                                created_at: timestamp,
                            },
                        },
                    ],
                },
                Receipt: {
                    type: "object",
                    properties: {
                        _id: { type: "string" },
                        payment_id: { type: "string" },
                        receipt_type: { type: "string", enum: ["RECEIPT", "INVOICE"] },
                        issuer_fiscal_id: { type: "string" },
                        receiving_company_id: { type: "string", nullable: true },
                        receiving_user_id: { type: "string", nullable: true },
                        series: { type: "string", example: "B001" },
                        number: { type: "string", example: "00000001" },
                        total: { type: "number" },
                        currency: { type: "string", example: "PEN" },
                        issued_at: timestamp,
                    },
                },
                Commission: {
                    type: "object",
                    properties: {
                        _id: { type: "string" },
                        payment_id: { type: "string" },
                        assignment_id: { type: "string" },
                        driver_id: { type: "string" },
                        base_amount: { type: "number", example: 100 },
                        percentage: { type: "number", example: 15 },
                        amount: { type: "number", example: 15 },
                        status: { type: "string", enum: ["GENERATED", "PARTIAL", "PAID"] },
                        created_at: timestamp,
                        updated_at: timestamp,
                    },
                },
                CommissionPayment: {
                    type: "object",
                    properties: {
                        _id: { type: "string" },
                        commission_id: { type: "string" },
                        amount: { type: "number", example: 10 },
                        reference: { type: "string", nullable: true },
                        notes: { type: "string", nullable: true },
                        created_at: timestamp,
                    },
                },
                DriverAccountBalance: {
                    type: "object",
                    properties: {
                        driver_id: { type: "string" },
                        balance: { type: "number", example: 15 },
                        updated_at: { ...timestamp, nullable: true },
                    },
                },
            },
        },
    },
    apis: isProd
        ? ["dist/routes/*.js", "dist/srv_config.js"]
        : ["src/routes/*.ts", "src/srv_config.ts"],
});
