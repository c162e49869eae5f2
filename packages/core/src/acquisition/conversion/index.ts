export type { ModelConverter, ConversionContext } from './types.js';
export { ConverterRegistry } from './registry.js';
export { CopyConverter } from './copy-converter.js';
export { SafetensorsRemapConverter, remapSafetensorsFile, renameTensor } from './safetensors-remap.js';
export type { TensorRename } from './safetensors-remap.js';
