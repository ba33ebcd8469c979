import { Request, Response } from "express";
import { RECEIPT_TYPE_CODES } from "@/contracts/interfaces/payment.interface";
import { PaymentsService } from "@/services/payments.service";
import { FINANZAS_RULES } from "@/utils/constants";
import { badRequest, isObjectId, optionalString, sendError } from "@/utils/express";

const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;

export class PaymentsController {
    private paymentsService = new PaymentsService();

    public async register_payment(req: Request, res: Response) {
        try {
            const {
                payment_method_id,
                assignment_id,
                total_amount,
                issue_receipt,
                receipt_type_code,
                issuer_fiscal_id,
                receiving_company_id,
                receiving_user_id,
                currency
            } = req.body ?? {};

            if (!isObjectId(payment_method_id) || !isObjectId(assignment_id)) {
                badRequest(res, "payment_method_id y assignment_id son requeridos y deben ser ids válidos");
                return;
            }

            const amount = Number(total_amount);
            if (total_amount === undefined || total_amount === null || !Number.isFinite(amount) || amount <= 0) {
                badRequest(res, "total_amount debe ser un número mayor a 0");
                return;
            }

            if (amount > FINANZAS_RULES.MAX_AMOUNT) {
                badRequest(res, `total_amount no puede superar ${FINANZAS_RULES.MAX_AMOUNT}`);
                return;
            }

            if (issue_receipt !== undefined && typeof issue_receipt !== "boolean") {
                badRequest(res, "issue_receipt debe ser booleano");
                return;
            }

            const type = optionalString(receipt_type_code)?.toUpperCase();
            if (type !== undefined && !RECEIPT_TYPE_CODES.some((code) => code === type)) {
                badRequest(res, `receipt_type_code debe ser uno de: ${RECEIPT_TYPE_CODES.join(", ")}`);
                return;
            }

            const currencyCode = optionalString(currency);
            if (currencyCode !== undefined && !CURRENCY_PATTERN.test(currencyCode)) {
                badRequest(res, "currency debe ser un código de 3 letras");
                return;
            }

            for (const [field, value] of Object.entries({ receiving_company_id, receiving_user_id })) {
                if (value !== undefined && value !== null && !isObjectId(value)) {
                    badRequest(res, `${field} no es un id válido`);
                    return;
                }
            }

            const payment = await this.paymentsService.register_payment({
                payment_method_id,
                assignment_id,
                total_amount: amount,
                issue_receipt: issue_receipt ?? false,
                receipt_type_code: type,
                issuer_fiscal_id: optionalString(issuer_fiscal_id),
                receiving_company_id: isObjectId(receiving_company_id) ? receiving_company_id : undefined,
                receiving_user_id: isObjectId(receiving_user_id) ? receiving_user_id : undefined,
                currency: currencyCode,
            });

            res.status(201).json({
                message: "Pago registrado correctamente",
                data: payment
            });
        } catch (error) {
            sendError(res, error, "Error al registrar el pago");
        }
    }

    public async get_payment(req: Request, res: Response) {
        try {
            const { payment_id } = req.params;
            if (!isObjectId(payment_id)) {
                badRequest(res, "payment_id no es un id válido");
                return;
            }

            const data = await this.paymentsService.get_payment_detail({ payment_id });

            res.status(200).json({
                message: "Pago obtenido correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al obtener el pago");
        }
    }
}
