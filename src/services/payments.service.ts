import { NewPayment, Payment } from "@/contracts/interfaces/payment.interface";
import { Receipt } from "@/contracts/interfaces/receipt.interface";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { ResponseError } from "@/utils/errors";
import { round2 } from "@/utils/money";

export class PaymentsService {
    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {}

    /**
     * Registra un pago. El recibo y la comisión los generan los disparadores
     * de creación, no esta llamada.
     */
    public async register_payment(input: NewPayment): Promise<Payment> {
        try {
            if (!(input.total_amount > 0)) throw new ResponseError(400, "total_amount debe ser mayor a 0");

            return await this.repository.insertPayment({
                ...input,
                total_amount: round2(input.total_amount),
                receipt_type_code: input.receipt_type_code?.toUpperCase(),
                currency: input.currency?.toUpperCase(),
            });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            console.error("Error al registrar el pago:", error);
            throw new ResponseError(500, "No se pudo registrar el pago");
        }
    }

    public async get_payment_detail({
        payment_id
    }: {
        payment_id: string;
    }): Promise<{ payment: Payment; receipt: Receipt | null }> {
        try {
            const payment = await this.repository.findPayment(payment_id);
            if (!payment) throw new ResponseError(404, "Pago no encontrado");

            const receipt = await this.repository.findReceiptByPayment(payment_id);
            return { payment, receipt };
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            console.error(`Error al obtener el pago ${payment_id}:`, error);
            throw new ResponseError(500, "No se pudo obtener el pago");
        }
    }
}
