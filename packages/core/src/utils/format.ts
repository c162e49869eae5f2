const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable binary size, one decimal: `1536` → `"1.5 KB"`.
 */
export function formatSize(bytes: number): string {
    let unitIndex = 0;
    let size = bytes;

    while (size >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
        size /= 1024;
        unitIndex++;
    }

    return `${size.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}
