import cors, { CorsOptions } from "cors";
import express, { Application, NextFunction, Request, Response } from "express";
import morgan from "morgan";
import rateLimit from "express-rate-limit";

import { GLOBAL_ENV, ALLOWED_ORIGINS, ALLOWED_METHODS } from "@/utils/constants";

import swaggerUi from "swagger-ui-express";
import { swaggerSpec } from "@/swagger";

// Importar rutas
import paymentsRouter from "@/routes/payments.routes";
import commissionsRouter from "@/routes/commissions.routes";
import driversRouter from "@/routes/drivers.routes";

const corsOptions: CorsOptions = {
    origin: ALLOWED_ORIGINS,
    methods: ALLOWED_METHODS,
    credentials: true,
    optionsSuccessStatus: 204,
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin', 'X-Requested-With'],
};

const generalLimiter = rateLimit({
    windowMs: 10 * 60 * 1000,    // 10 minutos
    max: 500,
    message: {
        ok: false,
        message: "Demasiadas peticiones desde esta IP, intente de nuevo en 10 minutos",
    },
    standardHeaders: true,
    legacyHeaders: false,
});

const app: Application = express();

// #======== MIDDLEWARES ========#
app.use(express.json({ limit: "1mb" }));
app.use(cors(corsOptions));
app.use(generalLimiter);
if (GLOBAL_ENV.NODE_ENV !== "test") {
    app.use(morgan("dev"));
}


// #======== ROUTES ========#
/**
 * @openapi
 * /health:
 *   get:
 *     tags: [Health]
 *     summary: Health check
 *     description: Verifica que el servidor está arriba y devuelve timestamp + IP.
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/HealthResponse'
 */
app.get(`${GLOBAL_ENV.ROUTER_SUBFIJE}/health`, (req: Request, res: Response) => {
    res.status(200).json({
        ok: true,
        message: "Server is running",
        timestamp: new Date().toISOString(),
        ip: req.ip
    });
});

// Documentación Swagger
app.get(`${GLOBAL_ENV.ROUTER_SUBFIJE}/docs.json`, (req: Request, res: Response) => {
    res.status(200).json(swaggerSpec);
});
app.use(`${GLOBAL_ENV.ROUTER_SUBFIJE}/docs`, swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
    customCss: ".swagger-ui .topbar { display: none }",
    customSiteTitle: "COMISIONES TRANSPORTE API - Documentación"
}));

// Rutas de la API
app.use(`${GLOBAL_ENV.ROUTER_SUBFIJE}/payments`, paymentsRouter);
app.use(`${GLOBAL_ENV.ROUTER_SUBFIJE}/commissions`, commissionsRouter);
app.use(`${GLOBAL_ENV.ROUTER_SUBFIJE}/drivers`, driversRouter);

// Manejo de rutas no encontradas (debe ir al final)
app.use((req: Request, res: Response) => {
    res.status(404).json({
        ok: false,
        message: "Route not found"
    });
});

// express.json rechaza cuerpos mal formados con un SyntaxError
app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
        res.status(400).json({ ok: false, message: "El cuerpo de la petición no es un JSON válido" });
        return;
    }
    console.error("❌ Error no controlado:", error);
    res.status(500).json({ ok: false, message: "Error interno del servidor" });
});


export default app;
