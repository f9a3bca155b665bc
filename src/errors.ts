/**
 * Raised when a search is attempted with a query that is blank after trimming.
 */
export class EmptyQueryError extends Error {
    constructor(message: string = "Query must not be empty.") {
        super(message);
        this.name = "EmptyQueryError";
    }
}

/**
 * Raised when an index is built from zero chunks.
 */
export class EmptyIndexError extends Error {
    constructor(message: string = "No chunks to index.") {
        super(message);
        this.name = "EmptyIndexError";
    }
}

/**
 * Raised when a document cannot be decoded into text.
 * Callers in a batch log it and treat the document as having no content.
 */
export class ExtractionError extends Error {
    constructor(public readonly fileName: string, reason: string) {
        super(`Could not extract text from ${fileName}: ${reason}`);
        this.name = "ExtractionError";
    }
}

export class InvalidConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidConfigError";
    }
}

/** Raised when a vector's length differs from the index dimensionality. */
export class DimensionMismatchError extends Error {
    constructor(public readonly expected: number, public readonly actual: number) {
        super(`Embedding dimension mismatch: expected ${expected}, got ${actual}.`);
        this.name = "DimensionMismatchError";
    }
}
