import { Request, Response } from "express";
import { COMMISSION_STATUSES, CommissionStatus } from "@/contracts/interfaces/commission.interface";
import { CommissionsService } from "@/services/commissions.service";
import { FINANZAS_RULES } from "@/utils/constants";
import { badRequest, isObjectId, optionalString, sendError } from "@/utils/express";

const toCommissionStatus = (value: string): CommissionStatus | undefined =>
    COMMISSION_STATUSES.find((status) => status === value);

export class CommissionsController {
    private commissionsService = new CommissionsService();

    public async register_commission_payment(req: Request, res: Response) {
        try {
            const { commission_id } = req.params;
            const { amount, reference, notes } = req.body ?? {};

            if (!isObjectId(commission_id)) {
                badRequest(res, "commission_id no es un id válido");
                return;
            }

            const value = Number(amount);
            if (amount === undefined || amount === null || !Number.isFinite(value) || value <= 0) {
                badRequest(res, "amount debe ser un número mayor a 0");
                return;
            }

            if (value > FINANZAS_RULES.MAX_AMOUNT) {
                badRequest(res, `amount no puede superar ${FINANZAS_RULES.MAX_AMOUNT}`);
                return;
            }

            const data = await this.commissionsService.register_commission_payment({
                commission_id,
                amount: value,
                reference: optionalString(reference),
                notes: optionalString(notes),
            });

            res.status(201).json({
                message: "Abono de comisión registrado correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al registrar el abono de comisión");
        }
    }

    public async get_commission_payments(req: Request, res: Response) {
        try {
            const { commission_id } = req.params;
            if (!isObjectId(commission_id)) {
                badRequest(res, "commission_id no es un id válido");
                return;
            }

            const data = await this.commissionsService.get_commission_payments({ commission_id });

            res.status(200).json({
                message: "Historial de abonos obtenido correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al obtener el historial de abonos");
        }
    }

    public async list_driver_commissions(req: Request, res: Response) {
        try {
            const { driver_id } = req.params;
            if (!isObjectId(driver_id)) {
                badRequest(res, "driver_id no es un id válido");
                return;
            }

            const rawStatus = optionalString(req.query.status)?.toUpperCase();
            const status = rawStatus ? toCommissionStatus(rawStatus) : undefined;
            if (rawStatus && !status) {
                badRequest(res, `status debe ser uno de: ${COMMISSION_STATUSES.join(", ")}`);
                return;
            }

            const data = await this.commissionsService.list_driver_commissions({ driver_id, status });

            res.status(200).json({
                message: "Comisiones obtenidas correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al obtener las comisiones");
        }
    }

    public async get_driver_balance(req: Request, res: Response) {
        try {
            const { driver_id } = req.params;
            if (!isObjectId(driver_id)) {
                badRequest(res, "driver_id no es un id válido");
                return;
            }

            const data = await this.commissionsService.get_driver_balance({ driver_id });

            res.status(200).json({
                message: "Estado de cuenta obtenido correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al obtener el estado de cuenta");
        }
    }

    public async recompute_driver_balance(req: Request, res: Response) {
        try {
            const { driver_id } = req.params;
            if (!isObjectId(driver_id)) {
                badRequest(res, "driver_id no es un id válido");
                return;
            }

            const data = await this.commissionsService.recompute_driver_balance({ driver_id });

            res.status(200).json({
                message: "Estado de cuenta recalculado correctamente",
                data
            });
        } catch (error) {
            sendError(res, error, "Error al recalcular el estado de cuenta");
        }
    }
}
