// packages/cli/src/cli/commands/models.ts

/**
 * CLI commands for browsing and managing local models.
 *
 * Commands:
 *   modelvault models list                - List catalog models with install status
 *   modelvault models search <query>      - Search names, descriptions and tags
 *   modelvault models info <id>           - Show model details
 *   modelvault models download <id>       - Download a model (Ctrl-C cancels)
 *   modelvault models remove <id>         - Remove an installed model
 *   modelvault models refresh-catalog     - Fetch the remote catalog for the next run
 */

import { setTimeout as sleep } from 'timers/promises';
import chalk from 'chalk';
import * as p from '@clack/prompts';
import { z } from 'zod';
import {
    ModelCategorySchema,
    expandHome,
    formatSize,
    type ConcludedSession,
    type LocalModel,
    type ModelCategory,
    type ModelEntry,
    type ModelVault,
} from '@modelvault/core';

const CATEGORY_LABELS: Record<ModelCategory, string> = {
    llm: 'Language models',
    vlm: 'Vision-language models',
    asr: 'Speech recognition',
    tts: 'Text to speech',
    image_gen: 'Image generation',
};

const ListCommandSchema = z
    .object({
        category: ModelCategorySchema.optional(),
        installed: z.boolean().default(false),
    })
    .strict();

export type ListCommandOptionsInput = z.input<typeof ListCommandSchema>;

export function categoryLabel(category: ModelCategory): string {
    return CATEGORY_LABELS[category];
}

/**
 * Plain-text status, e.g. `installed` or `error: HTTP 404 ...`
 */
export function describeStatus(model: LocalModel): string {
    switch (model.status.state) {
        case 'ready':
            return 'installed';
        case 'downloading':
            return 'downloading';
        case 'error':
            return `error: ${model.status.errorMessage ?? 'unknown error'}`;
        case 'not_downloaded':
            return 'not installed';
    }
}

/**
 * Models grouped by category, in first-seen category order
 */
export function groupByCategory<T extends { category: ModelCategory }>(models: T[]): Map<ModelCategory, T[]> {
    const groups = new Map<ModelCategory, T[]>();
    for (const model of models) {
        const group = groups.get(model.category);
        if (group) {
            group.push(model);
        } else {
            groups.set(model.category, [model]);
        }
    }
    return groups;
}

export function sizeLabel(entry: ModelEntry): string {
    if (entry.storage.sizeDisplay) {
        return entry.storage.sizeDisplay;
    }
    return entry.storage.sizeBytes > 0 ? formatSize(entry.storage.sizeBytes) : 'size unknown';
}

/**
 * One-line manual installation hint for sources that cannot be fetched
 */
export function manualInstallHint(entry: ModelEntry): string | undefined {
    if (entry.source.kind !== 'manual-only') {
        return undefined;
    }
    const parts = [entry.source.instructions, entry.source.url ? `See ${entry.source.url}` : undefined];
    return parts.filter((part): part is string => Boolean(part)).join(' ') || 'See the model description.';
}

function statusIcon(model: LocalModel): string {
    switch (model.status.state) {
        case 'ready':
            return chalk.green('✓');
        case 'downloading':
            return chalk.cyan('↓');
        case 'error':
            return chalk.red('✗');
        case 'not_downloaded':
            return chalk.gray('○');
    }
}

/**
 * Handle models list command.
 */
export async function handleModelsListCommand(
    vault: ModelVault,
    options: ListCommandOptionsInput
): Promise<void> {
    const validated = ListCommandSchema.parse(options);
    let models = vault.listModels(validated.category);
    if (validated.installed) {
        models = models.filter((model) => model.status.state === 'ready');
    }

    console.log(chalk.cyan(`\n📋 ${validated.installed ? 'Installed' : 'Available'} Models\n`));

    if (models.length === 0) {
        console.log(chalk.gray(validated.installed ? 'No models installed yet.' : 'No models match.'));
        console.log(chalk.gray('  modelvault models download <id>     Download a model\n'));
        return;
    }

    for (const [category, group] of groupByCategory(models)) {
        console.log(chalk.yellow(`  ${categoryLabel(category)}:`));
        for (const model of group) {
            console.log(`    ${statusIcon(model)} ${chalk.bold(model.id)} ${chalk.dim(`(${sizeLabel(model)})`)}`);
            if (model.description) {
                console.log(chalk.gray(`      ${model.description}`));
            }
            if (model.status.state === 'error') {
                console.log(chalk.red(`      ${describeStatus(model)}`));
            }
        }
        console.log();
    }

    console.log(chalk.dim('✓ = installed, ↓ = downloading, ✗ = failed'));
    console.log(chalk.dim('Use: modelvault models download <id>\n'));
}

/**
 * Handle models search command.
 */
export async function handleModelsSearchCommand(vault: ModelVault, query: string): Promise<void> {
    const matches = vault.search(query);
    if (matches.length === 0) {
        console.log(chalk.gray(`No models match '${query}'.`));
        return;
    }
    for (const entry of matches) {
        const tags = entry.tags.length > 0 ? chalk.dim(` [${entry.tags.join(', ')}]`) : '';
        console.log(`  ${chalk.bold(entry.id)}  ${entry.name}${tags}`);
    }
}

/**
 * Handle models info command.
 */
export async function handleModelsInfoCommand(vault: ModelVault, modelId: string): Promise<void> {
    const model = vault.getModel(modelId);
    if (!model) {
        console.log(chalk.red(`❌ Model '${modelId}' not found.`));
        console.log(chalk.gray('Use `modelvault models list` to see available models.\n'));
        return;
    }

    console.log(chalk.cyan(`\n📄 ${model.name}\n`));
    console.log(`  ID: ${model.id}`);
    console.log(`  Category: ${categoryLabel(model.category)}`);
    if (model.description) {
        console.log(`  Description: ${model.description}`);
    }
    if (model.tags.length > 0) {
        console.log(`  Tags: ${model.tags.join(', ')}`);
    }
    console.log(`  Size: ${sizeLabel(model)}`);
    if (model.runtime.memoryGb > 0) {
        console.log(`  Memory: ${model.runtime.memoryGb} GB`);
    }
    console.log(`  Source: ${model.source.kind}${model.source.url ? ` ${model.source.url}` : ''}`);
    if (model.source.kind !== 'manual-only' && model.source.backupUrls.length > 0) {
        console.log(`  Mirrors: ${model.source.backupUrls.join(', ')}`);
    }
    console.log(`  Path: ${expandHome(model.storage.localPath)}`);
    console.log(`  Status: ${describeStatus(model)}`);
    const usage = diskUsageLabel(model);
    if (usage) {
        console.log(`  On disk: ${usage}`);
    }

    const hint = manualInstallHint(model);
    if (hint) {
        console.log(chalk.yellow(`\n  Manual installation required. ${hint}`));
    }
    console.log();
}

/**
 * What the last scan found in the install directory, if anything
 */
export function diskUsageLabel(model: LocalModel): string | undefined {
    const { downloadedFiles, downloadedBytes, lastChecked } = model.status;
    if (downloadedFiles === 0) {
        return undefined;
    }
    const entries = `${downloadedFiles} ${downloadedFiles === 1 ? 'entry' : 'entries'}`;
    const checked = lastChecked ? ` (checked ${lastChecked})` : '';
    return `${entries}, ${formatSize(downloadedBytes)}${checked}`;
}

export interface DownloadCommandOptions {
    /** Delay between status polls */
    pollIntervalMs?: number;
}

/**
 * Handle models download command.
 * Polls the vault until the session concludes; SIGINT requests cancellation.
 *
 * @returns whether the model ended up installed
 */
export async function handleModelsDownloadCommand(
    vault: ModelVault,
    modelId: string,
    options: DownloadCommandOptions = {}
): Promise<boolean> {
    const { pollIntervalMs = 250 } = options;
    const model = vault.getModel(modelId);
    if (!model) {
        console.log(chalk.red(`❌ Model '${modelId}' not found in catalog.`));
        return false;
    }
    if (model.status.state === 'ready') {
        console.log(chalk.yellow(`Model '${modelId}' is already installed.`));
        console.log(chalk.gray(`  Path: ${expandHome(model.storage.localPath)}`));
        return true;
    }

    console.log(chalk.cyan(`\n📥 Downloading ${model.name} (${sizeLabel(model)})\n`));
    const spinner = p.spinner();
    spinner.start('Starting download...');

    // The spinner stops itself on SIGINT; later output goes to the console
    let spinning = true;
    const update = (text: string) => {
        if (spinning) {
            spinner.message(text);
        }
    };
    const finish = (text: string) => {
        if (spinning) {
            spinning = false;
            spinner.stop(text);
        } else {
            console.log(text);
        }
    };
    const onInterrupt = () => {
        spinning = false;
        if (vault.cancel(modelId)) {
            console.log(chalk.yellow('Cancelling...'));
        }
    };
    process.on('SIGINT', onInterrupt);

    try {
        await vault.download(modelId);
        let conclusion: ConcludedSession | undefined;
        while (!conclusion) {
            const result = await vault.poll();
            conclusion = result.concluded.find((session) => session.modelId === modelId);
            const progress = result.progress.find((view) => view.modelId === modelId);
            if (progress) {
                update(progress.text);
            }
            if (!conclusion) {
                await sleep(pollIntervalMs);
            }
        }
        finish(conclusionMessage(conclusion, expandHome(model.storage.localPath)));
        return conclusion.outcome === 'completed';
    } catch (error) {
        finish(chalk.red('❌ Download failed'));
        throw error;
    } finally {
        process.off('SIGINT', onInterrupt);
    }
}

export function conclusionMessage(conclusion: ConcludedSession, directory: string): string {
    switch (conclusion.outcome) {
        case 'completed':
            return chalk.green(`✅ Installed to ${directory}`);
        case 'failed':
            return chalk.red(`❌ ${conclusion.errorMessage ?? 'Download failed'}`);
        case 'cancelled':
            return chalk.yellow('Download cancelled; partial files removed.');
    }
}

export interface RemoveCommandOptions {
    /** Skip the confirmation prompt */
    yes?: boolean;
}

/**
 * Handle models remove command.
 */
export async function handleModelsRemoveCommand(
    vault: ModelVault,
    modelId: string,
    options: RemoveCommandOptions = {}
): Promise<boolean> {
    const model = vault.getModel(modelId);
    if (!model || model.status.state !== 'ready') {
        console.log(chalk.yellow(`Model '${modelId}' is not installed.\n`));
        return false;
    }

    const directory = expandHome(model.storage.localPath);
    if (!options.yes) {
        console.log(chalk.dim(`Directory: ${directory}`));
        const confirmed = await p.confirm({ message: `Remove ${model.name} (${sizeLabel(model)})?` });
        if (p.isCancel(confirmed) || !confirmed) {
            console.log(chalk.gray('Removal cancelled.\n'));
            return false;
        }
    }

    const updated = await vault.remove(modelId);
    console.log(chalk.green(`✅ Model '${modelId}' removed (${describeStatus(updated)}).`));
    return true;
}

/**
 * Handle models refresh-catalog command.
 */
export async function handleRefreshCatalogCommand(vault: ModelVault): Promise<boolean> {
    if (!vault.config.remoteCatalogUrl) {
        console.log(chalk.yellow('No remote catalog configured.'));
        console.log(chalk.gray('  Set MODELVAULT_CATALOG_URL to enable catalog refresh.'));
        return false;
    }

    const spinner = p.spinner();
    spinner.start(`Fetching ${vault.config.remoteCatalogUrl}`);
    const updated = await vault.refreshCatalog();
    if (updated) {
        spinner.stop(chalk.green('✅ Catalog updated; changes apply on the next run.'));
    } else {
        spinner.stop(chalk.yellow('Catalog refresh failed; run with MODELVAULT_LOG_LEVEL=debug for details.'));
    }
    return updated;
}
