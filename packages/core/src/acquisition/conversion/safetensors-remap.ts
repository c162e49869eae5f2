import { createReadStream, createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import type { ConversionContext, ModelConverter } from './types.js';
import { listFilesRecursive } from './walk.js';

const RemapOptionsSchema = z
    .object({
        renames: z
            .array(z.object({ from: z.string().min(1), to: z.string() }).strict())
            .min(1)
            .describe('Tensor name prefix rewrites; the first matching rule wins'),
    })
    .strict();

export type TensorRename = z.output<typeof RemapOptionsSchema>['renames'][number];

/** u64 little-endian header length, then the JSON header */
const LENGTH_PREFIX_BYTES = 8;
const METADATA_KEY = '__metadata__';

export function renameTensor(name: string, renames: TensorRename[]): string {
    for (const rule of renames) {
        if (name.startsWith(rule.from)) {
            return rule.to + name.slice(rule.from.length);
        }
    }
    return name;
}

/**
 * Rewrite tensor names in a `.safetensors` header. Data offsets are relative to
 * the data section, so the tensor bytes are streamed across untouched.
 */
export async function remapSafetensorsFile(
    source: string,
    destination: string,
    renames: TensorRename[]
): Promise<number> {
    const handle = await fs.open(source, 'r');
    let dataStart: number;
    let header: Record<string, unknown>;
    try {
        const { size } = await handle.stat();
        const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
        await handle.read(prefix, 0, LENGTH_PREFIX_BYTES, 0);
        const headerLength = Number(prefix.readBigUInt64LE(0));
        if (headerLength <= 0 || LENGTH_PREFIX_BYTES + headerLength > size) {
            throw new Error(`header length ${headerLength} exceeds file size ${size}`);
        }

        const raw = Buffer.alloc(headerLength);
        await handle.read(raw, 0, headerLength, LENGTH_PREFIX_BYTES);
        const parsed = z.record(z.unknown()).safeParse(JSON.parse(raw.toString('utf-8')));
        if (!parsed.success) {
            throw new Error('header is not a JSON object');
        }
        header = parsed.data;
        dataStart = LENGTH_PREFIX_BYTES + headerLength;
    } finally {
        await handle.close();
    }

    const remapped: Record<string, unknown> = {};
    let renamed = 0;
    for (const [name, info] of Object.entries(header)) {
        const target = name === METADATA_KEY ? name : renameTensor(name, renames);
        if (target in remapped) {
            throw new Error(`tensor name collision on '${target}'`);
        }
        if (target !== name) renamed++;
        remapped[target] = info;
    }

    // Header is padded with spaces to keep the data section 8-byte aligned
    let json = JSON.stringify(remapped);
    const padding = (8 - ((LENGTH_PREFIX_BYTES + Buffer.byteLength(json)) % 8)) % 8;
    json += ' '.repeat(padding);
    const headerBytes = Buffer.from(json, 'utf-8');
    const lengthBytes = Buffer.alloc(LENGTH_PREFIX_BYTES);
    lengthBytes.writeBigUInt64LE(BigInt(headerBytes.byteLength), 0);

    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, Buffer.concat([lengthBytes, headerBytes]));
    await pipeline(
        createReadStream(source, { start: dataStart }),
        createWriteStream(destination, { flags: 'a' })
    );
    return renamed;
}

/**
 * Renames tensors in every `.safetensors` file by prefix; other files are copied
 */
export class SafetensorsRemapConverter implements ModelConverter {
    readonly name = 'safetensors-remap';

    async convert({ stagingDir, destinationDir, options, logger, modelId }: ConversionContext): Promise<void> {
        const parsed = RemapOptionsSchema.safeParse(options);
        if (!parsed.success) {
            throw new Error(`invalid options: ${parsed.error.message}`);
        }
        const { renames } = parsed.data;

        for (const relative of await listFilesRecursive(stagingDir)) {
            const source = path.join(stagingDir, relative);
            const destination = path.join(destinationDir, relative);
            if (relative.endsWith('.safetensors')) {
                const renamed = await remapSafetensorsFile(source, destination, renames);
                logger.debug(`Remapped ${renamed} tensors in ${relative}`, { modelId });
            } else {
                await fs.mkdir(path.dirname(destination), { recursive: true });
                await fs.copyFile(source, destination);
            }
        }
    }
}
