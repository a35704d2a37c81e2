import { InMemoryAuditLog, type AuditLog } from "../../../libs/audit/auditLog.js";
import { PgAuditLog } from "../../../libs/audit/pgAuditLog.js";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { SessionController } from "../../../libs/controller/sessionController.js";
import { db } from "../../../libs/db/index.js";
import { EscalationCoordinator } from "../../../libs/escalation/coordinator.js";
import { LoggingNotifier, WebhookNotifier, type EscalationNotifier } from "../../../libs/escalation/notifier.js";
import { PgEscalationRepository } from "../../../libs/escalation/pgRepository.js";
import { InMemoryEscalationRepository, type EscalationRepository } from "../../../libs/escalation/repository.js";
import { createHttpEvaluatorRegistry } from "../../../libs/evaluators/httpEvaluators.js";
import { EvaluatorInvoker } from "../../../libs/evaluators/invoker.js";
import { createRefillApp } from "../../../libs/http/refillRouter.js";
import { logger } from "../../../libs/logging/logger.js";
import { InMemorySessionStore } from "../../../libs/session/memoryStore.js";
import { PgSessionStore } from "../../../libs/session/pgStore.js";
import type { SessionStore } from "../../../libs/session/store.js";

const REDELIVERY_INTERVAL_MS = 30_000;

function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value || value.trim() === "") {
        throw new Error(`Required env var ${name} is missing`);
    }
    return value;
}

async function main() {
    const backend = process.env.STORE_BACKEND === "memory" ? "memory" : "postgres";
    const config = await bootstrap("refill-api", { backend });

    const store: SessionStore = backend === "postgres"
        ? new PgSessionStore()
        : new InMemorySessionStore({ defaultTtlMs: config.sessionTtlMs });
    const auditLog: AuditLog = backend === "postgres" ? new PgAuditLog() : new InMemoryAuditLog();
    const repository: EscalationRepository = backend === "postgres"
        ? new PgEscalationRepository()
        : new InMemoryEscalationRepository();

    const webhookUrl = process.env.REVIEWER_WEBHOOK_URL;
    const notifier: EscalationNotifier = webhookUrl ? new WebhookNotifier(webhookUrl) : new LoggingNotifier();

    const registry = createHttpEvaluatorRegistry(
        requireEnv("EVALUATOR_BASE_URL"),
        requireEnv("DRUG_INDEX_BASE_URL"),
        config.disambiguation
    );
    const invoker = new EvaluatorInvoker(registry, config);
    const coordinator = new EscalationCoordinator(repository, notifier);
    const controller = new SessionController({ store, auditLog, evaluators: invoker, coordinator, config });

    const app = createRefillApp({ controller, coordinator, health: invoker });
    const port = Number(process.env.PORT ?? 8080);
    const server = app.listen(port, () => {
        logger.info({ port, backend }, "Refill API listening");
    });

    const redelivery = setInterval(() => {
        coordinator.redeliverPending().catch(err => {
            logger.error({ error: err instanceof Error ? err.message : String(err) }, "Escalation redelivery failed");
        });
    }, REDELIVERY_INTERVAL_MS);

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        clearInterval(redelivery);
        server.close(() => {
            db.close()
                .catch(err => logger.error({ error: err instanceof Error ? err.message : String(err) }, "Pool close failed"))
                .finally(() => process.exit(0));
        });
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
