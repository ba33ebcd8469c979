import { GLOBAL_ENV } from "@/utils/constants";
import { ResponseError } from "@/utils/errors";
import mongoose from "mongoose";

export class InitiConnection {
    private static instance: InitiConnection;
    private constructor() {}

    public static getInstance(): InitiConnection {
        if (!InitiConnection.instance) {
            InitiConnection.instance = new InitiConnection();
        }
        return InitiConnection.instance;
    }

    /**
     * Los disparadores usan change streams y el conciliador transacciones:
     * MONGODB_URI debe apuntar a un replica set.
     */
    public async connect(): Promise<void> {
        if (!GLOBAL_ENV.MONGODB_URI) {
            throw new ResponseError(500, "MONGODB_URI is not defined");
        }

        const db = await mongoose.connect(GLOBAL_ENV.MONGODB_URI, {
            dbName: GLOBAL_ENV.MONGODB_DB_NAME,
        });

        if (db.connection.readyState === 1) {
            console.log("✅ Conectado a MongoDB");
        }
    }

    public async disconnect(): Promise<void> {
        await mongoose.disconnect();
        console.log("🔌 Desconectado de MongoDB");
    }
}
