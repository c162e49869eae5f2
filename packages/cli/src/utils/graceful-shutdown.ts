import type { ModelVault } from '@modelvault/core';
import { errorMessage } from '@modelvault/core';

/**
 * Shut the vault down on SIGTERM so running downloads are cancelled and
 * their directories cleaned before exit. SIGINT is left to the command in
 * progress (the download command turns it into a cancellation).
 */
export function registerGracefulShutdown(getVault: () => ModelVault | undefined): void {
    let isShuttingDown = false;

    const performShutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        const vault = getVault();
        vault?.logger.info(`Received ${signal}, shutting down gracefully...`);
        try {
            await vault?.shutdown();
            process.exit(0);
        } catch (error) {
            console.error(`Shutdown error: ${errorMessage(error)}`);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void performShutdown('SIGTERM'));
}
