/**
 * Missing or invalid configuration detected before any I/O.
 * The message names what to set.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A lookup data file or input artifact that could not be read or validated.
 */
export class DataFileError extends Error {
    constructor(
        message: string,
        public readonly path: string
    ) {
        super(message);
        this.name = 'DataFileError';
    }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
