/**
 * The extraction service could not be reached before any document was
 * processed. The only condition that aborts a run.
 */
export class ExtractionUnavailableError extends Error {
    constructor(
        message: string,
        public readonly service: string
    ) {
        super(message);
        this.name = 'ExtractionUnavailableError';
    }
}

/**
 * Numerical failure inside the matrix factorization.
 */
export class FactorizationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FactorizationError';
    }
}

/**
 * Invalid configuration, commentary or papers file.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly path?: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Mutation attempted on a sealed corpus.
 */
export class CorpusSealedError extends Error {
    constructor() {
        super('Corpus is sealed; papers can no longer be appended');
        this.name = 'CorpusSealedError';
    }
}
