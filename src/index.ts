import { buildApp } from './app';
import { config } from './config';
import { closePool } from './db';
import { createGrpcServer, startGrpcServer, stopGrpcServer } from './grpc/server';
import { createAuthService } from './services/auth';
import { logger } from './utils/logger';

async function main() {
    // ─── Initialize Services ───
    const { service, sessions } = createAuthService(config);

    const app = await buildApp({ service, config });
    const grpcServer = createGrpcServer(service);

    // ─── Start Servers ───
    try {
        await app.listen({ port: config.httpPort, host: config.host });
        const grpcPort = await startGrpcServer(grpcServer, config.host, config.grpcPort);
        logger.info(
            { httpPort: config.httpPort, grpcPort, env: config.nodeEnv },
            'Auth service started'
        );
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, 'Shutting down...');

        const results = await Promise.allSettled([app.close(), stopGrpcServer(grpcServer)]);
        const released = await Promise.allSettled([sessions.close(), closePool()]);
        const failures = [...results, ...released].filter(
            (result): result is PromiseRejectedResult => result.status === 'rejected'
        );
        for (const failure of failures) {
            logger.error({ err: failure.reason }, 'Error during shutdown');
        }
        process.exit(failures.length > 0 ? 1 : 0);
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
