import { Router } from "express";
import { CommissionsController } from "@/controllers/commissions.controller";

const router: Router = Router();
const commissionsController = new CommissionsController();

/**
 * @openapi
 * /commissions/driver/{driver_id}:
 *   get:
 *     tags: [Commissions]
 *     summary: Comisiones de un conductor
 *     description: Ordenadas de la más reciente a la más antigua.
 *     parameters:
 *       - in: path
 *         name: driver_id
 *         required: true
 *         schema: { type: string }
 *       - in: query
 *         name: status
 *         schema: { type: string, enum: [GENERATED, PARTIAL, PAID] }
 *     responses:
 *       200:
 *         description: Comisiones obtenidas correctamente
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/Commission' }
 */
router.get("/driver/:driver_id", commissionsController.list_driver_commissions.bind(commissionsController));

/**
 * @openapi
 * /commissions/{commission_id}/payments:
 *   post:
 *     tags: [Commissions]
 *     summary: Registrar un abono contra una comisión
 *     description: |
 *       La creación del abono dispara el recálculo del estado de la comisión
 *       y del estado de cuenta del conductor.
 *     parameters:
 *       - in: path
 *         name: commission_id
 *         required: true
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               amount: { type: number, example: 10.5 }
 *               reference: { type: string }
 *               notes: { type: string }
 *             required: [amount]
 *     responses:
 *       201:
 *         description: Abono registrado
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/CommissionPayment' }
 *       404:
 *         description: Comisión no encontrada
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Commissions]
 *     summary: Historial de abonos de una comisión
 *     parameters:
 *       - in: path
 *         name: commission_id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Historial de abonos
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/CommissionPayment' }
 */
router.post("/:commission_id/payments", commissionsController.register_commission_payment.bind(commissionsController));
router.get("/:commission_id/payments", commissionsController.get_commission_payments.bind(commissionsController));

export default router;
