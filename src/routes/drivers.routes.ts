import { Router } from "express";
import { CommissionsController } from "@/controllers/commissions.controller";

const router: Router = Router();
const commissionsController = new CommissionsController();

/**
 * @openapi
 * /drivers/{driver_id}/balance:
 *   get:
 *     tags: [Drivers]
 *     summary: Estado de cuenta del conductor
 *     description: Sin registro de estado de cuenta se devuelve saldo 0.
 *     parameters:
 *       - in: path
 *         name: driver_id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Estado de cuenta
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/DriverAccountBalance' }
 */
router.get("/:driver_id/balance", commissionsController.get_driver_balance.bind(commissionsController));

/**
 * @openapi
 * /drivers/{driver_id}/balance/recompute:
 *   post:
 *     tags: [Drivers]
 *     summary: Recalcular el estado de cuenta del conductor
 *     parameters:
 *       - in: path
 *         name: driver_id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Estado de cuenta recalculado
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/DriverAccountBalance' }
 */
router.post("/:driver_id/balance/recompute", commissionsController.recompute_driver_balance.bind(commissionsController));

export default router;
