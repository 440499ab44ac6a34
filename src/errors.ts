export class CrimeAggError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'CrimeAggError';
    }
}

/**
 * Input problems that abort an aggregation run. Nothing is written when one
 * of these is thrown.
 */
export class FatalInputError extends CrimeAggError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'FatalInputError';
    }
}

export class NoPartitionsError extends FatalInputError {
    constructor(public readonly location: string) {
        super(`No raw partitions found: ${location}`);
        this.name = 'NoPartitionsError';
    }
}

export class PartitionReadError extends FatalInputError {
    constructor(public readonly filePath: string, reason: string, originalError?: unknown) {
        super(`Cannot read partition ${filePath}: ${reason}`, originalError);
        this.name = 'PartitionReadError';
    }
}

export class MalformedFilterError extends CrimeAggError {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedFilterError';
    }
}

export class ArtifactIntegrityError extends CrimeAggError {
    constructor(message: string) {
        super(message);
        this.name = 'ArtifactIntegrityError';
    }
}

export class ArtifactNotFoundError extends CrimeAggError {
    constructor(public readonly dir: string) {
        super(`No published artifact set in ${dir}`);
        this.name = 'ArtifactNotFoundError';
    }
}

export class AggregatorStateError extends CrimeAggError {
    constructor(message: string) {
        super(message);
        this.name = 'AggregatorStateError';
    }
}

export class LockTimeoutError extends CrimeAggError {
    constructor(message: string) {
        super(message);
        this.name = 'LockTimeoutError';
    }
}
