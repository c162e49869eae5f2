// Load environment variables before configuration is resolved
import { applyLayeredEnvironmentLoading } from './utils/env.js';

applyLayeredEnvironmentLoading();

import { createRequire } from 'module';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { ModelVault, errorMessage } from '@modelvault/core';
import {
    handleModelsDownloadCommand,
    handleModelsInfoCommand,
    handleModelsListCommand,
    handleModelsRemoveCommand,
    handleModelsSearchCommand,
    handleRefreshCatalogCommand,
    type ListCommandOptionsInput,
    type RemoveCommandOptions,
} from './cli/commands/models.js';
import { registerGracefulShutdown } from './utils/graceful-shutdown.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

let currentVault: ModelVault | undefined;
registerGracefulShutdown(() => currentVault);

/**
 * Build and start a vault, run the command, then shut down.
 * A `false` result or a thrown error sets a non-zero exit code.
 */
function withVault<A extends unknown[]>(
    name: string,
    handler: (vault: ModelVault, ...args: A) => Promise<boolean | void>
): (...args: A) => Promise<void> {
    return async (...args: A) => {
        const vault = new ModelVault();
        currentVault = vault;
        try {
            await vault.init();
            const result = await handler(vault, ...args);
            if (result === false) {
                process.exitCode = 1;
            }
        } catch (err) {
            console.error(chalk.red(`❌ modelvault ${name} command failed: ${errorMessage(err)}`));
            process.exitCode = 1;
        } finally {
            await vault.shutdown();
            currentVault = undefined;
        }
    };
}

const program = new Command();

program
    .name('modelvault')
    .description('Browse, download and manage local AI models')
    .version(pkg.version, '-v, --version', 'output the current version');

const modelsCommand = program.command('models').description('Manage local models');

modelsCommand
    .command('list')
    .description('List catalog models with their install status')
    .option('-c, --category <category>', 'Only show one category (llm, vlm, asr, tts, image_gen)')
    .option('-i, --installed', 'Only show installed models')
    .action(
        withVault('models list', (vault, options: ListCommandOptionsInput) =>
            handleModelsListCommand(vault, options)
        )
    );

modelsCommand
    .command('search')
    .description('Search model names, descriptions and tags')
    .argument('<query>', 'Case-insensitive search text')
    .action(withVault('models search', (vault, query: string) => handleModelsSearchCommand(vault, query)));

modelsCommand
    .command('info')
    .description('Show model details')
    .argument('<id>', 'Model ID')
    .action(withVault('models info', (vault, modelId: string) => handleModelsInfoCommand(vault, modelId)));

modelsCommand
    .command('download')
    .description('Download a model (Ctrl-C cancels and removes partial files)')
    .argument('<id>', 'Model ID')
    .action(
        withVault('models download', (vault, modelId: string) => handleModelsDownloadCommand(vault, modelId))
    );

modelsCommand
    .command('remove')
    .description('Remove an installed model')
    .argument('<id>', 'Model ID')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(
        withVault('models remove', (vault, modelId: string, options: RemoveCommandOptions) =>
            handleModelsRemoveCommand(vault, modelId, options)
        )
    );

modelsCommand
    .command('refresh-catalog')
    .description('Fetch the remote catalog; changes apply on the next run')
    .action(withVault('models refresh-catalog', (vault) => handleRefreshCatalogCommand(vault)));

await program.parseAsync(process.argv);
