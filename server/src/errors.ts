/** Coordinate axes are empty or unusable; extraction must not proceed. */
export class GridConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GridConfigError';
    }
}

/** The gridded-data source has nothing for the requested initialization cycle. */
export class UpstreamUnavailableError extends Error {
    constructor(public readonly initTime: string, message = `No gridded data for cycle ${initTime}`) {
        super(message);
        this.name = 'UpstreamUnavailableError';
    }
}

export class PersistenceError extends Error {
    constructor(public readonly document: string, public readonly attempts: number, public readonly reason?: unknown) {
        super(`Failed to write ${document} after ${attempts} attempts`);
        this.name = 'PersistenceError';
    }
}

export class RunTimeoutError extends Error {
    constructor(public readonly job: string, public readonly timeoutMs: number) {
        super(`${job} exceeded ${timeoutMs}ms`);
        this.name = 'RunTimeoutError';
    }
}
