import { AcquisitionError } from '../errors.js';
import { CopyConverter } from './copy-converter.js';
import { SafetensorsRemapConverter } from './safetensors-remap.js';
import type { ModelConverter } from './types.js';

/**
 * Named converters available to catalog entries
 */
export class ConverterRegistry {
    private readonly converters = new Map<string, ModelConverter>();

    static withDefaults(): ConverterRegistry {
        return new ConverterRegistry().register(new CopyConverter()).register(new SafetensorsRemapConverter());
    }

    register(converter: ModelConverter): this {
        this.converters.set(converter.name, converter);
        return this;
    }

    has(name: string): boolean {
        return this.converters.has(name);
    }

    names(): string[] {
        return [...this.converters.keys()];
    }

    /**
     * @throws VaultRuntimeError for an unregistered name
     */
    get(name: string): ModelConverter {
        const converter = this.converters.get(name);
        if (!converter) {
            throw AcquisitionError.unknownConverter(name, this.names());
        }
        return converter;
    }
}
