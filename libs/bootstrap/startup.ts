import { enforceAuditImmutability, type AuditBackend } from "../audit/immutability.js";
import { db } from "../db/index.js";
import { logger } from "../logging/logger.js";
import { loadWorkflowConfig, type WorkflowConfig } from "./config/workflow-config.js";

export interface BootstrapOptions {
    readonly backend: AuditBackend;
    readonly env?: NodeJS.ProcessEnv;
}

/**
 * Startup checks shared by every entry point. Returns the validated
 * workflow configuration; any failure aborts the boot.
 */
export async function bootstrap(serviceName: string, options: BootstrapOptions): Promise<WorkflowConfig> {
    const env = options.env ?? process.env;
    logger.info({ serviceName, backend: options.backend }, "Bootstrapping service");

    enforceAuditImmutability(options.backend, env);
    const config = loadWorkflowConfig(env);

    if (options.backend === "postgres") {
        await db.probeRoles();
    }

    logger.info({ serviceName }, "Startup checks passed");
    return config;
}
