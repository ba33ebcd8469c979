import { Server as HttpServer } from "http";
import { InitiConnection } from "./config/db.config";
import { BalanceCron } from "./cron/balance.cron";
import FinanzasQueue from "./queues/finanzas.queue";
import app from "./srv_config";
import { FinanzasTriggers } from "./triggers/finanzas.triggers";
import { GLOBAL_ENV } from "./utils/constants";
import FinanzasWorker from "./workers/finanzas.worker";

class Server {
    private port: number;
    private dbConnection: InitiConnection;
    private httpServer: HttpServer | null = null;
    private balanceCron = new BalanceCron();
    private shuttingDown = false;

    constructor() {
        this.port = GLOBAL_ENV.PORT;
        this.dbConnection = InitiConnection.getInstance();
    }

    public async start(): Promise<void> {
        await this.dbConnection.connect();

        FinanzasQueue.getInstance().initialize();
        FinanzasWorker.getInstance().initialize();
        FinanzasTriggers.getInstance().start();
        this.balanceCron.start();

        this.httpServer = app.listen(this.port, () => {
            console.log(`🚀 Servidor corriendo en puerto ${this.port}`);
        });
    }

    private closeHttpServer(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.httpServer) return resolve();
            this.httpServer.close((error) => (error ? reject(error) : resolve()));
        });
    }

    public async shutDown(): Promise<void> {
        if (this.shuttingDown) return;
        this.shuttingDown = true;
        try {
            console.log("🔄 Cerrando servidor");
            await this.closeHttpServer();
            this.balanceCron.stop();
            await FinanzasTriggers.getInstance().stop();
            await FinanzasWorker.getInstance().close();
            await FinanzasQueue.getInstance().close();
            await this.dbConnection.disconnect();
            process.exit(0);
        } catch (error) {
            console.log("❌ Error al cerrar el servidor", error);
            process.exit(1);
        }
    }
}

const server = new Server();

server.start().catch((error: unknown) => {
    console.error("❌ Error al iniciar el servidor", error);
    process.exit(1);
});

process.on("SIGINT", () => {
    void server.shutDown();
});

process.on("SIGTERM", () => {
    void server.shutDown();
});

process.on('uncaughtException', (error) => {
    console.error('❌ Error no capturado:', error);
    void server.shutDown();
});

process.on('unhandledRejection', (reason) => {
    console.error('❌ Promesa rechazada no manejada:', reason);
    void server.shutDown();
});

export default server;
