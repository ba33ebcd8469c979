import { Router } from "express";
import { PaymentsController } from "@/controllers/payments.controller";

const router: Router = Router();
const paymentsController = new PaymentsController();

/**
 * @openapi
 * /payments:
 *   post:
 *     tags: [Payments]
 *     summary: Registrar un pago
 *     description: |
 *       Registra el pago de un servicio. La creación dispara, de forma independiente,
 *       la emisión del recibo (si `issue_receipt`) y la comisión del conductor
 *       (si el método de pago es `DIRECT_*`).
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/PaymentInput'
 *     responses:
 *       201:
 *         description: Pago registrado correctamente
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data: { $ref: '#/components/schemas/Payment' }
 *       400:
 *         description: Datos inválidos
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
router.post("/", paymentsController.register_payment.bind(paymentsController));

/**
 * @openapi
 * /payments/{payment_id}:
 *   get:
 *     tags: [Payments]
 *     summary: Obtener un pago con su recibo
 *     parameters:
 *       - in: path
 *         name: payment_id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Pago obtenido correctamente
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string }
 *                 data:
 *                   type: object
 *                   properties:
 *                     payment: { $ref: '#/components/schemas/Payment' }
 *                     receipt:
 *                       nullable: true
 *                       allOf:
 *                         - $ref: '#/components/schemas/Receipt'
 *       404:
 *         description: Pago no encontrado
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
router.get("/:payment_id", paymentsController.get_payment.bind(paymentsController));

export default router;
