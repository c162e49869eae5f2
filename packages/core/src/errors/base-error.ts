/**
 * Root of the error hierarchy. Keeps `name` aligned with the concrete subclass
 * so logs and `instanceof` checks agree.
 */
export abstract class VaultBaseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    /**
     * Serializable view used by structured logging and CLI JSON output
     */
    abstract toJSON(): Record<string, unknown>;
}
